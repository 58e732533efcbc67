import { Appointment } from './appointment.entity';
import { Doctor } from './doctor.entity';
import { Patient } from './patient.entity';
import { Visit } from './visit.entity';

export { Appointment, Doctor, Patient, Visit };

export const CLINIC_ENTITIES = [Patient, Doctor, Appointment, Visit];

/** Source tables in dependency order. */
export const CLINIC_TABLES = ['patients', 'doctors', 'appointments', 'visits'] as const;

export type ClinicTable = (typeof CLINIC_TABLES)[number];
