import { Entity, Column, PrimaryGeneratedColumn, Check } from 'typeorm';

@Entity({ name: 'doctors' })
@Check('chk_doctors_experience', '"years_of_experience" >= 0')
export class Doctor {
  @PrimaryGeneratedColumn({ name: 'doctor_id' })
  doctorId!: number;

  @Column({ name: 'first_name', length: 50 })
  firstName!: string;

  @Column({ name: 'last_name', length: 50 })
  lastName!: string;

  @Column({ length: 50 })
  specialization!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  department!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  email!: string | null;

  @Column({ name: 'years_of_experience', type: 'int', nullable: true })
  yearsOfExperience!: number | null;

  @Column({ name: 'accepting_new_patients', type: 'boolean', nullable: true, default: true })
  acceptingNewPatients!: boolean | null;

  @Column({ name: 'updated_at', type: 'timestamp', nullable: true, default: () => 'CURRENT_TIMESTAMP' })
  updatedAt!: Date | null;
}
