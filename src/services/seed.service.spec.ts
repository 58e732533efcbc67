import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SeedService, SourceNotEmptyError } from './seed.service';
import { loadKitConfig } from '../config/configuration';
import { CLINIC_STORE } from '../interfaces/clinic-store.interface';
import { AppointmentStatus, AppointmentType } from '../models/appointment-status';
import { InMemoryClinicStore } from '../testing/in-memory-clinic-store';
import { CLOCK } from '../utils/clock';

const NOW = new Date(2025, 5, 10, 8, 0, 0);

describe('SeedService', () => {
  let service: SeedService;
  let store: InMemoryClinicStore;
  const mockConfigService = {
    get: jest.fn((key: 'seed') => loadKitConfig({})[key]),
  };

  async function createService(target: InMemoryClinicStore): Promise<SeedService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SeedService,
        { provide: CLINIC_STORE, useValue: target },
        { provide: ConfigService, useValue: mockConfigService },
        { provide: CLOCK, useValue: { now: () => NOW } },
      ],
    }).compile();
    return module.get<SeedService>(SeedService);
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new InMemoryClinicStore();
    service = await createService(store);
  });

  it('should load the snapshot volumes exactly', async () => {
    const summary = await service.seed();
    expect(summary).toEqual({
      seed: 1,
      doctors: 10,
      patients: 100,
      appointments: { past: 150, upcoming: 20, total: 170 },
      visits: 100,
      statusDistribution: [
        { status: 'completed', count: 100 },
        { status: 'cancelled', count: 40 },
        { status: 'scheduled', count: 15 },
        { status: 'no_show', count: 10 },
        { status: 'confirmed', count: 5 },
      ],
    });
    expect(store.transactions).toBe(1);
  });

  it('should prefer an explicit seed over the configured one', async () => {
    const summary = await service.seed({ seed: 7 });
    expect(summary.seed).toBe(7);
    expect(mockConfigService.get).not.toHaveBeenCalled();
  });

  it('should be reproducible for the same seed', async () => {
    const other = new InMemoryClinicStore();
    await service.seed({ seed: 11 });
    await (await createService(other)).seed({ seed: 11 });
    expect(other.tables).toEqual(store.tables);
  });

  it('should change the generated rows with the seed', async () => {
    const other = new InMemoryClinicStore();
    await service.seed({ seed: 11 });
    await (await createService(other)).seed({ seed: 12 });
    expect(other.tables.patients).not.toEqual(store.tables.patients);
  });

  it('should generate patient demographics inside the registration windows', async () => {
    await service.seed();
    const providers = [
      'HealthGuard Insurance',
      'WellCare Plus',
      'Premier Health Network',
      'Wellness First Insurance',
      'CareBridge Health',
      'LifeSecure Health',
      'Guardian Health Plans',
      'Medicare',
      'Medicaid',
    ];
    for (const patient of store.tables.patients) {
      expect(patient.dateOfBirth >= '1945-01-01').toBe(true);
      expect(patient.dateOfBirth <= '2015-12-31').toBe(true);
      expect(patient.state).toMatch(/^[A-Z]{2}$/);
      expect(patient.city).toEqual(expect.any(String));
      expect(patient.address).toEqual(expect.any(String));
      expect(providers).toContain(patient.insuranceProvider);
      expect(patient.email).toMatch(/@email\.example$/);

      const registered = patient.registrationDate;
      expect(registered).toBeInstanceOf(Date);
      expect(registered?.getFullYear()).toBeGreaterThanOrEqual(2022);
      expect(registered?.getFullYear()).toBeLessThanOrEqual(2024);
      expect(registered?.getHours()).toBeGreaterThanOrEqual(8);
      expect(registered?.getHours()).toBeLessThanOrEqual(17);
      expect([0, 15, 30, 45]).toContain(registered?.getMinutes());
    }
  });

  it('should number patient phones and e-mails by insertion order', async () => {
    await service.seed();
    const [first] = store.tables.patients;
    expect(first.phone).toBe('555-1001');
    expect(first.email).toMatch(/^[a-z0-9]+\.[a-z0-9]+1@/);
    expect(store.tables.patients[99].phone).toBe('555-1100');
  });

  it('should keep past appointments inside the 90-day window and office hours', async () => {
    await service.seed();
    const past = store.tables.appointments.slice(0, 150);
    for (const appointment of past) {
      expect(appointment.appointmentDate >= '2025-03-12').toBe(true);
      expect(appointment.appointmentDate <= '2025-06-09').toBe(true);
      expect(appointment.appointmentTime >= '08:00:00').toBe(true);
      expect(appointment.appointmentTime <= '16:45:00').toBe(true);
      const createdAt = appointment.createdAt?.getTime() ?? Number.NaN;
      const updatedAt = appointment.updatedAt?.getTime() ?? Number.NaN;
      expect(createdAt).toBeLessThan(updatedAt);
    }
  });

  it('should schedule upcoming appointments after today as scheduled or confirmed', async () => {
    await service.seed();
    const upcoming = store.tables.appointments.slice(150);
    expect(upcoming).toHaveLength(20);
    expect(upcoming[0]).toMatchObject({
      patientId: 1,
      doctorId: 1,
      appointmentDate: '2025-06-11',
      appointmentTime: '09:00:00',
      status: AppointmentStatus.SCHEDULED,
    });
    for (const appointment of upcoming) {
      expect(appointment.appointmentDate > '2025-06-10').toBe(true);
      expect([AppointmentStatus.SCHEDULED, AppointmentStatus.CONFIRMED]).toContain(appointment.status);
    }
  });

  it('should attach exactly one matching visit to each completed appointment', async () => {
    await service.seed();
    const completed = store.tables.appointments.filter((row) => row.status === AppointmentStatus.COMPLETED);
    expect(store.tables.visits.map((visit) => visit.appointmentId)).toEqual(
      completed.map((appointment) => appointment.appointmentId),
    );
    for (const visit of store.tables.visits) {
      const appointment = completed.find((row) => row.appointmentId === visit.appointmentId);
      expect(visit.patientId).toBe(appointment?.patientId);
      expect(visit.doctorId).toBe(appointment?.doctorId);
      expect(visit.visitDate).toBe(appointment?.appointmentDate);
      expect(visit.visitEndTime).not.toBeNull();
      expect((visit.visitEndTime?.getTime() ?? 0) - visit.visitStartTime.getTime()).toBe(30 * 60_000);
      expect(typeof visit.followUpRequired).toBe('boolean');
      expect(typeof visit.prescriptionGiven).toBe('boolean');
      expect(visit.totalCharge).toBeGreaterThanOrEqual(75);
      expect(visit.totalCharge).toBeLessThanOrEqual(350);
    }
  });

  it('should refuse to seed populated tables and leave them untouched', async () => {
    await store.insertDoctors([
      {
        firstName: 'Ana',
        lastName: 'Reyes',
        specialization: 'Cardiology',
        department: 'Cardiovascular',
        phone: '555-0000',
        email: 'ana.reyes@clinic.test',
        yearsOfExperience: 4,
        acceptingNewPatients: true,
        updatedAt: NOW,
      },
    ]);
    const attempt = service.seed();
    await expect(attempt).rejects.toBeInstanceOf(SourceNotEmptyError);
    await expect(attempt).rejects.toThrow(
      'Source tables already hold data (doctors=1); run "source init" before seeding',
    );
    expect(await store.countRows()).toEqual({ patients: 0, doctors: 1, appointments: 0, visits: 0 });
  });

  it('should reject an upcoming appointment that references a missing patient', () => {
    const catalog = {
      appointments: [
        {
          patientNumber: 5,
          doctorNumber: 1,
          dayOffset: 1,
          time: '09:00',
          status: AppointmentStatus.SCHEDULED,
          reason: 'Routine checkup',
          type: AppointmentType.ROUTINE,
          createdDaysAgo: 1,
          updatedDaysAgo: 1,
        },
      ],
    };
    expect(() => service.buildUpcomingAppointments(catalog, [], [], NOW)).toThrow(
      'Upcoming appointment references patient #5 / doctor #1, but only 0 patients and 0 doctors exist',
    );
  });
});
