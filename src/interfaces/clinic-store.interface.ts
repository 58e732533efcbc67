import { Appointment, ClinicTable, Doctor, Patient, Visit } from '../models';
import { AppointmentStatus } from '../models/appointment-status';

export const CLINIC_STORE = Symbol('CLINIC_STORE');

export type NewDoctor = Omit<Doctor, 'doctorId'>;
export type NewPatient = Omit<Patient, 'patientId'>;
export type NewAppointment = Omit<Appointment, 'appointmentId' | 'patient' | 'doctor'>;
export type NewVisit = Omit<Visit, 'visitId' | 'appointment' | 'patient' | 'doctor'>;

export type TableCounts = Record<ClinicTable, number>;

export interface StatusCount {
  status: string;
  count: number;
}

/**
 * Row selection for lifecycle transitions. Candidates are always returned in
 * `appointment_date, appointment_time, appointment_id` order so that a limited
 * transition picks the same rows on every run.
 */
export interface AppointmentCriteria {
  status: AppointmentStatus;
  appointmentDate?: string;
  /** Exclusive lower bound on `appointment_time` (HH:MM:SS). */
  timeAfter?: string;
  /** Exclusive upper bound on `appointment_time`. */
  timeBefore?: string;
  /** Inclusive upper bound on `appointment_time`. */
  timeUntil?: string;
  limit?: number;
}

export interface IntegrityFacts {
  counts: TableCounts;
  patientsWithNullNames: number;
  doctorsWithNullNames: number;
  appointmentsWithNullSchedule: number;
  visitsWithNullCharge: number;
  appointmentsWithUnknownStatus: number;
  visitsForIncompleteAppointments: number;
  appointmentsWithDuplicateVisits: number;
  visitsWithNegativeCharge: number;
  visitsWithMismatchedParties: number;
  statusDistribution: StatusCount[];
}

export interface IClinicStore {
  insertDoctors(doctors: NewDoctor[]): Promise<Doctor[]>;
  insertPatients(patients: NewPatient[]): Promise<Patient[]>;
  insertAppointments(appointments: NewAppointment[]): Promise<Appointment[]>;
  insertVisits(visits: NewVisit[]): Promise<Visit[]>;
  findAppointments(criteria: AppointmentCriteria): Promise<Appointment[]>;
  updateAppointmentStatus(
    appointmentIds: number[],
    from: AppointmentStatus,
    to: AppointmentStatus,
    at: Date,
  ): Promise<Appointment[]>;
  setDoctorAvailability(doctorId: number, acceptingNewPatients: boolean, at: Date): Promise<Doctor | null>;
  countRows(): Promise<TableCounts>;
  statusDistribution(): Promise<StatusCount[]>;
  findAppointmentsUpdatedSince(since: Date, limit: number): Promise<Appointment[]>;
  collectIntegrityFacts(): Promise<IntegrityFacts>;
  runInTransaction<T>(work: (store: IClinicStore) => Promise<T>): Promise<T>;
}
