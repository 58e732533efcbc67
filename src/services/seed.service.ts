import { faker } from '@faker-js/faker';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'node:path';
import { KitConfig } from '../config/configuration';
import {
  ClinicalVocabularyDto,
  DoctorCatalogDto,
  PatientPoolDto,
  UpcomingCatalogDto,
} from '../dto/seed-catalog.dto';
import {
  CLINIC_STORE,
  IClinicStore,
  NewAppointment,
  NewDoctor,
  NewPatient,
  NewVisit,
  StatusCount,
  TableCounts,
} from '../interfaces/clinic-store.interface';
import { Appointment, Doctor, Patient } from '../models';
import { AppointmentStatus, AppointmentType } from '../models/appointment-status';
import {
  addDays,
  addMinutes,
  combineDateTime,
  daysBefore,
  minutesToTime,
  normalizeTime,
  toIsoDate,
} from '../utils/clinic-calendar';
import { CLOCK, Clock } from '../utils/clock';
import { DATA_DIR, readValidatedJson } from '../utils/data-files';

export const PATIENT_COUNT = 100;
export const PAST_WINDOW_DAYS = 90;
export const VISIT_MINUTES = 30;

/** Exact status mix of the historical appointments; one visit per completed row. */
export const PAST_STATUS_QUOTAS: ReadonlyArray<[AppointmentStatus, number]> = [
  [AppointmentStatus.COMPLETED, 100],
  [AppointmentStatus.CANCELLED, 40],
  [AppointmentStatus.NO_SHOW, 10],
];

const FIRST_SLOT_MINUTES = 8 * 60;
const SLOT_COUNT = 36;

export interface SeedCatalog {
  doctors: DoctorCatalogDto;
  pool: PatientPoolDto;
  upcoming: UpcomingCatalogDto;
  vocabulary: ClinicalVocabularyDto;
}

export interface SeedOptions {
  seed?: number;
}

export interface SeedSummary {
  seed: number;
  doctors: number;
  patients: number;
  appointments: {
    past: number;
    upcoming: number;
    total: number;
  };
  visits: number;
  statusDistribution: StatusCount[];
}

function describePopulated(counts: TableCounts): string {
  return Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([table, count]) => `${table}=${count}`)
    .join(', ');
}

export class SourceNotEmptyError extends Error {
  constructor(public readonly counts: TableCounts) {
    super(`Source tables already hold data (${describePopulated(counts)}); run "source init" before seeding`);
    this.name = 'SourceNotEmptyError';
  }
}

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    @Inject(CLINIC_STORE) private readonly store: IClinicStore,
    private readonly configService: ConfigService<KitConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async loadCatalog(dataDir = DATA_DIR): Promise<SeedCatalog> {
    const [doctors, pool, upcoming, vocabulary] = await Promise.all([
      readValidatedJson(path.join(dataDir, 'doctors.json'), DoctorCatalogDto),
      readValidatedJson(path.join(dataDir, 'patient-pool.json'), PatientPoolDto),
      readValidatedJson(path.join(dataDir, 'upcoming-appointments.json'), UpcomingCatalogDto),
      readValidatedJson(path.join(dataDir, 'clinical-vocabulary.json'), ClinicalVocabularyDto),
    ]);
    return { doctors, pool, upcoming, vocabulary };
  }

  async seed(options: SeedOptions = {}): Promise<SeedSummary> {
    const seed = options.seed ?? this.configService.get('seed', { infer: true }).randomSeed;
    faker.seed(seed);
    const catalog = await this.loadCatalog();
    const now = this.clock.now();
    this.logger.log(`Seeding synthetic snapshot with seed ${seed}`);

    const summary = await this.store.runInTransaction(async (store) => {
      const counts = await store.countRows();
      if (Object.values(counts).some((count) => count > 0)) {
        throw new SourceNotEmptyError(counts);
      }

      const doctors = await store.insertDoctors(this.buildDoctors(catalog.doctors, now));
      this.logger.log(`Inserted ${doctors.length} doctors`);

      const patients = await store.insertPatients(this.generatePatients(catalog.pool));
      this.logger.log(`Inserted ${patients.length} patients`);

      const past = await store.insertAppointments(
        this.generatePastAppointments(patients, doctors, catalog.vocabulary, now),
      );
      const upcoming = await store.insertAppointments(
        this.buildUpcomingAppointments(catalog.upcoming, patients, doctors, now),
      );
      this.logger.log(`Inserted ${past.length} past and ${upcoming.length} upcoming appointments`);

      const completed = past.filter((appointment) => appointment.status === AppointmentStatus.COMPLETED);
      const visits = await store.insertVisits(this.generateVisits(completed, catalog.vocabulary));
      this.logger.log(`Inserted ${visits.length} visits`);

      return {
        seed,
        doctors: doctors.length,
        patients: patients.length,
        appointments: {
          past: past.length,
          upcoming: upcoming.length,
          total: past.length + upcoming.length,
        },
        visits: visits.length,
        statusDistribution: await store.statusDistribution(),
      };
    });

    this.logger.log(`Snapshot seeded: ${JSON.stringify(summary.statusDistribution)}`);
    return summary;
  }

  buildDoctors(catalog: DoctorCatalogDto, now: Date): NewDoctor[] {
    return catalog.doctors.map((doctor) => ({
      firstName: doctor.firstName,
      lastName: doctor.lastName,
      specialization: doctor.specialization,
      department: doctor.department,
      phone: doctor.phone,
      email: doctor.email,
      yearsOfExperience: doctor.yearsOfExperience,
      acceptingNewPatients: doctor.acceptingNewPatients,
      updatedAt: now,
    }));
  }

  generatePatients(pool: PatientPoolDto, count = PATIENT_COUNT): NewPatient[] {
    return Array.from({ length: count }, (_, index) => {
      const firstName = faker.person.firstName();
      const lastName = faker.person.lastName();
      const registered = faker.date.between({ from: new Date(2022, 0, 1), to: new Date(2024, 11, 31) });
      return {
        firstName,
        lastName,
        dateOfBirth: toIsoDate(faker.date.between({ from: new Date(1945, 0, 1), to: new Date(2015, 11, 31) })),
        phone: `555-${1001 + index}`,
        email: `${slug(firstName)}.${slug(lastName)}${index + 1}@${pool.emailDomain}`,
        address: faker.location.streetAddress(),
        city: faker.location.city(),
        state: faker.location.state({ abbreviated: true }),
        insuranceProvider: faker.helpers.arrayElement(pool.insuranceProviders),
        registrationDate: new Date(
          registered.getFullYear(),
          registered.getMonth(),
          registered.getDate(),
          faker.number.int({ min: 8, max: 17 }),
          15 * faker.number.int({ min: 0, max: 3 }),
        ),
      };
    });
  }

  generatePastAppointments(
    patients: Patient[],
    doctors: Doctor[],
    vocabulary: ClinicalVocabularyDto,
    now: Date,
  ): NewAppointment[] {
    const today = toIsoDate(now);
    const statuses = faker.helpers.shuffle(
      PAST_STATUS_QUOTAS.flatMap(([status, quota]) => Array<AppointmentStatus>(quota).fill(status)),
    );

    return statuses.map((status) => {
      const appointmentDate = addDays(today, -faker.number.int({ min: 1, max: PAST_WINDOW_DAYS }));
      const appointmentTime = minutesToTime(FIRST_SLOT_MINUTES + 15 * faker.number.int({ min: 0, max: SLOT_COUNT - 1 }));
      const start = combineDateTime(appointmentDate, appointmentTime);
      let appointmentType = AppointmentType.URGENT;
      if (faker.datatype.boolean({ probability: 0.6 })) {
        appointmentType = AppointmentType.ROUTINE;
      } else if (faker.datatype.boolean({ probability: 0.85 })) {
        appointmentType = AppointmentType.FOLLOW_UP;
      }

      return {
        patientId: faker.helpers.arrayElement(patients).patientId,
        doctorId: faker.helpers.arrayElement(doctors).doctorId,
        appointmentDate,
        appointmentTime,
        status,
        reasonForVisit: faker.helpers.arrayElement(vocabulary.reasons),
        appointmentType,
        createdAt: daysBefore(start, faker.number.int({ min: 1, max: 14 })),
        updatedAt: addMinutes(start, VISIT_MINUTES),
      };
    });
  }

  buildUpcomingAppointments(
    catalog: UpcomingCatalogDto,
    patients: Patient[],
    doctors: Doctor[],
    now: Date,
  ): NewAppointment[] {
    const today = toIsoDate(now);
    return catalog.appointments.map((entry) => {
      const patient = patients[entry.patientNumber - 1];
      const doctor = doctors[entry.doctorNumber - 1];
      if (!patient || !doctor) {
        throw new Error(
          `Upcoming appointment references patient #${entry.patientNumber} / doctor #${entry.doctorNumber}, ` +
            `but only ${patients.length} patients and ${doctors.length} doctors exist`,
        );
      }
      return {
        patientId: patient.patientId,
        doctorId: doctor.doctorId,
        appointmentDate: addDays(today, entry.dayOffset),
        appointmentTime: normalizeTime(entry.time),
        status: entry.status,
        reasonForVisit: entry.reason,
        appointmentType: entry.type,
        createdAt: daysBefore(now, entry.createdDaysAgo),
        updatedAt: daysBefore(now, entry.updatedDaysAgo),
      };
    });
  }

  generateVisits(completed: Appointment[], vocabulary: ClinicalVocabularyDto): NewVisit[] {
    return completed.map((appointment) => {
      const start = combineDateTime(appointment.appointmentDate, appointment.appointmentTime);
      return {
        appointmentId: appointment.appointmentId,
        patientId: appointment.patientId,
        doctorId: appointment.doctorId,
        visitDate: appointment.appointmentDate,
        visitStartTime: start,
        visitEndTime: addMinutes(start, VISIT_MINUTES),
        diagnosis: faker.helpers.arrayElement(vocabulary.diagnoses),
        treatmentNotes: faker.helpers.arrayElement(vocabulary.treatmentNotes),
        followUpRequired: faker.datatype.boolean({ probability: 0.3 }),
        prescriptionGiven: faker.datatype.boolean({ probability: 0.4 }),
        totalCharge: faker.number.float({ min: 75, max: 350, fractionDigits: 2 }),
      };
    });
  }
}
