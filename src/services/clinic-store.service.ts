import { Injectable, Logger } from '@nestjs/common';
import {
  And,
  EntityManager,
  FindOperator,
  FindOptionsWhere,
  In,
  IsNull,
  LessThan,
  LessThanOrEqual,
  MoreThan,
  MoreThanOrEqual,
  Not,
} from 'typeorm';
import {
  AppointmentCriteria,
  IClinicStore,
  IntegrityFacts,
  NewAppointment,
  NewDoctor,
  NewPatient,
  NewVisit,
  StatusCount,
  TableCounts,
} from '../interfaces/clinic-store.interface';
import { Appointment, Doctor, Patient, Visit } from '../models';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../models/appointment-status';
import { DatabaseService } from './database.service';

const INSERT_CHUNK = 50;

const TRANSITION_ORDER = {
  appointmentDate: 'ASC',
  appointmentTime: 'ASC',
  appointmentId: 'ASC',
} as const;

/**
 * TypeORM implementation of the clinic store. An instance is bound either to
 * the data source's root manager or to the manager of one open transaction.
 */
export class EntityManagerClinicStore implements IClinicStore {
  constructor(
    private readonly resolveManager: () => Promise<EntityManager>,
    private readonly inTransaction = false,
  ) {}

  async insertDoctors(doctors: NewDoctor[]): Promise<Doctor[]> {
    const repository = (await this.resolveManager()).getRepository(Doctor);
    return repository.save(doctors.map((doctor) => repository.create(doctor)), { chunk: INSERT_CHUNK });
  }

  async insertPatients(patients: NewPatient[]): Promise<Patient[]> {
    const repository = (await this.resolveManager()).getRepository(Patient);
    return repository.save(patients.map((patient) => repository.create(patient)), { chunk: INSERT_CHUNK });
  }

  async insertAppointments(appointments: NewAppointment[]): Promise<Appointment[]> {
    const repository = (await this.resolveManager()).getRepository(Appointment);
    return repository.save(appointments.map((appointment) => repository.create(appointment)), { chunk: INSERT_CHUNK });
  }

  async insertVisits(visits: NewVisit[]): Promise<Visit[]> {
    const repository = (await this.resolveManager()).getRepository(Visit);
    return repository.save(visits.map((visit) => repository.create(visit)), { chunk: INSERT_CHUNK });
  }

  async findAppointments(criteria: AppointmentCriteria): Promise<Appointment[]> {
    const repository = (await this.resolveManager()).getRepository(Appointment);
    const where: FindOptionsWhere<Appointment> = { status: criteria.status };
    if (criteria.appointmentDate !== undefined) {
      where.appointmentDate = criteria.appointmentDate;
    }

    const bounds: FindOperator<string>[] = [];
    if (criteria.timeAfter !== undefined) bounds.push(MoreThan(criteria.timeAfter));
    if (criteria.timeBefore !== undefined) bounds.push(LessThan(criteria.timeBefore));
    if (criteria.timeUntil !== undefined) bounds.push(LessThanOrEqual(criteria.timeUntil));
    if (bounds.length === 1) {
      where.appointmentTime = bounds[0];
    } else if (bounds.length > 1) {
      where.appointmentTime = And(...bounds);
    }

    return repository.find({
      where,
      order: TRANSITION_ORDER,
      take: criteria.limit,
      lock: this.inTransaction ? { mode: 'pessimistic_write' } : undefined,
    });
  }

  async updateAppointmentStatus(
    appointmentIds: number[],
    from: AppointmentStatus,
    to: AppointmentStatus,
    at: Date,
  ): Promise<Appointment[]> {
    if (appointmentIds.length === 0) {
      return [];
    }
    const repository = (await this.resolveManager()).getRepository(Appointment);
    await repository.update({ appointmentId: In(appointmentIds), status: from }, { status: to, updatedAt: at });
    return repository.find({
      where: { appointmentId: In(appointmentIds), status: to },
      order: TRANSITION_ORDER,
    });
  }

  async setDoctorAvailability(doctorId: number, acceptingNewPatients: boolean, at: Date): Promise<Doctor | null> {
    const repository = (await this.resolveManager()).getRepository(Doctor);
    await repository.update({ doctorId }, { acceptingNewPatients, updatedAt: at });
    return repository.findOneBy({ doctorId });
  }

  async countRows(): Promise<TableCounts> {
    const manager = await this.resolveManager();
    const [patients, doctors, appointments, visits] = await Promise.all([
      manager.count(Patient),
      manager.count(Doctor),
      manager.count(Appointment),
      manager.count(Visit),
    ]);
    return { patients, doctors, appointments, visits };
  }

  async statusDistribution(): Promise<StatusCount[]> {
    const manager = await this.resolveManager();
    const rows = await manager
      .createQueryBuilder(Appointment, 'a')
      .select('a.status', 'status')
      .addSelect('COUNT(*)', 'total')
      .groupBy('a.status')
      .orderBy('total', 'DESC')
      .addOrderBy('a.status', 'ASC')
      .getRawMany<{ status: string; total: string }>();
    return rows.map((row) => ({ status: row.status, count: Number(row.total) }));
  }

  async findAppointmentsUpdatedSince(since: Date, limit: number): Promise<Appointment[]> {
    const repository = (await this.resolveManager()).getRepository(Appointment);
    return repository.find({
      where: { updatedAt: MoreThanOrEqual(since) },
      order: { updatedAt: 'DESC', appointmentId: 'DESC' },
      take: limit,
    });
  }

  async collectIntegrityFacts(): Promise<IntegrityFacts> {
    const manager = await this.resolveManager();
    const counts = await this.countRows();
    const statusDistribution = await this.statusDistribution();

    const patientsWithNullNames = await manager.count(Patient, {
      where: [{ firstName: IsNull() }, { lastName: IsNull() }],
    });
    const doctorsWithNullNames = await manager.count(Doctor, {
      where: [{ firstName: IsNull() }, { lastName: IsNull() }],
    });
    const appointmentsWithNullSchedule = await manager.count(Appointment, {
      where: [{ appointmentDate: IsNull() }, { appointmentTime: IsNull() }],
    });
    const visitsWithNullCharge = await manager.count(Visit, { where: { totalCharge: IsNull() } });
    const appointmentsWithUnknownStatus = await manager.count(Appointment, {
      where: { status: Not(In([...APPOINTMENT_STATUSES])) },
    });
    const visitsWithNegativeCharge = await manager.count(Visit, { where: { totalCharge: LessThan(0) } });

    const visitsForIncompleteAppointments = await manager
      .createQueryBuilder(Visit, 'v')
      .innerJoin('v.appointment', 'a')
      .where('a.status <> :completed', { completed: AppointmentStatus.COMPLETED })
      .getCount();

    const duplicated = await manager
      .createQueryBuilder(Visit, 'v')
      .select('v.appointmentId', 'appointmentId')
      .groupBy('v.appointmentId')
      .having('COUNT(*) > 1')
      .getRawMany<{ appointmentId: number }>();

    const visitsWithMismatchedParties = await manager
      .createQueryBuilder(Visit, 'v')
      .innerJoin('v.appointment', 'a')
      .where('v.patientId <> a.patientId OR v.doctorId <> a.doctorId')
      .getCount();

    return {
      counts,
      patientsWithNullNames,
      doctorsWithNullNames,
      appointmentsWithNullSchedule,
      visitsWithNullCharge,
      appointmentsWithUnknownStatus,
      visitsForIncompleteAppointments,
      appointmentsWithDuplicateVisits: duplicated.length,
      visitsWithNegativeCharge,
      visitsWithMismatchedParties,
      statusDistribution,
    };
  }

  async runInTransaction<T>(work: (store: IClinicStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    const manager = await this.resolveManager();
    return manager.transaction((transactional) =>
      work(new EntityManagerClinicStore(async () => transactional, true)),
    );
  }
}

@Injectable()
export class ClinicStoreService extends EntityManagerClinicStore {
  private readonly logger = new Logger(ClinicStoreService.name);

  constructor(databaseService: DatabaseService) {
    super(async () => (await databaseService.getDataSource()).manager);
    this.logger.log('ClinicStoreService bound to the source data source.');
  }
}
