import { Entity, Column, PrimaryGeneratedColumn, Check, Index, ManyToOne, JoinColumn, ValueTransformer } from 'typeorm';
import { Appointment } from './appointment.entity';
import { Doctor } from './doctor.entity';
import { Patient } from './patient.entity';

/** pg returns DECIMAL columns as strings. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : Number(value)),
};

@Entity({ name: 'visits' })
@Check('chk_visits_total_charge', '"total_charge" >= 0')
@Index('idx_visits_patient', ['patientId'])
@Index('idx_visits_doctor', ['doctorId'])
@Index('idx_visits_date', ['visitDate'])
export class Visit {
  @PrimaryGeneratedColumn({ name: 'visit_id' })
  visitId!: number;

  // Deliberately not unique: one visit per appointment is checked, not constrained.
  @Column({ name: 'appointment_id', type: 'int' })
  appointmentId!: number;

  @ManyToOne(() => Appointment, { nullable: false })
  @JoinColumn({ name: 'appointment_id' })
  appointment?: Appointment;

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

  @Column({ name: 'visit_date', type: 'date' })
  visitDate!: string;

  @Column({ name: 'visit_start_time', type: 'timestamp' })
  visitStartTime!: Date;

  @Column({ name: 'visit_end_time', type: 'timestamp', nullable: true })
  visitEndTime!: Date | null;

  @Column({ type: 'varchar', length: 200, nullable: true })
  diagnosis!: string | null;

  @Column({ name: 'treatment_notes', type: 'text', nullable: true })
  treatmentNotes!: string | null;

  @Column({ name: 'follow_up_required', type: 'boolean', nullable: true, default: false })
  followUpRequired!: boolean | null;

  @Column({ name: 'prescription_given', type: 'boolean', nullable: true, default: false })
  prescriptionGiven!: boolean | null;

  @Column({
    name: 'total_charge',
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  totalCharge!: number | null;
}
