import { Entity, Column, PrimaryGeneratedColumn, Check, Index, ManyToOne, JoinColumn } from 'typeorm';
import { APPOINTMENT_STATUSES, APPOINTMENT_TYPES, AppointmentStatus, AppointmentType, sqlLiteralList } from './appointment-status';
import { Doctor } from './doctor.entity';
import { Patient } from './patient.entity';

@Entity({ name: 'appointments' })
@Check('chk_appointments_status', `"status" IN (${sqlLiteralList(APPOINTMENT_STATUSES)})`)
@Check('chk_appointments_type', `"appointment_type" IN (${sqlLiteralList(APPOINTMENT_TYPES)})`)
@Index('idx_appointments_patient', ['patientId'])
@Index('idx_appointments_doctor', ['doctorId'])
@Index('idx_appointments_date', ['appointmentDate'])
@Index('idx_appointments_status', ['status'])
export class Appointment {
  @PrimaryGeneratedColumn({ name: 'appointment_id' })
  appointmentId!: number;

  @Column({ name: 'patient_id', type: 'int' })
  patientId!: number;

  @ManyToOne(() => Patient, { nullable: false })
  @JoinColumn({ name: 'patient_id' })
  patient?: Patient;

  @Column({ name: 'doctor_id', type: 'int' })
  doctorId!: number;

  @ManyToOne(() => Doctor, { nullable: false })
  @JoinColumn({ name: 'doctor_id' })
  doctor?: Doctor;

  @Column({ name: 'appointment_date', type: 'date' })
  appointmentDate!: string;

  @Column({ name: 'appointment_time', type: 'time' })
  appointmentTime!: string;

  @Column({ type: 'varchar', length: 20 })
  status!: AppointmentStatus;

  @Column({ name: 'reason_for_visit', type: 'varchar', length: 200, nullable: true })
  reasonForVisit!: string | null;

  @Column({ name: 'appointment_type', type: 'varchar', length: 20, nullable: true })
  appointmentType!: AppointmentType | null;

  @Column({ name: 'created_at', type: 'timestamp', nullable: true, default: () => 'CURRENT_TIMESTAMP' })
  createdAt!: Date | null;

  @Column({ name: 'updated_at', type: 'timestamp', nullable: true, default: () => 'CURRENT_TIMESTAMP' })
  updatedAt!: Date | null;
}
