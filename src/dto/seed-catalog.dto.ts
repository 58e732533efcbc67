import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsBoolean,
  IsEmail,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { AppointmentStatus, AppointmentType, BOOKABLE_STATUSES } from '../models/appointment-status';

export const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

export class DoctorSeedDto {
  @IsString()
  @IsNotEmpty()
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  lastName!: string;

  @IsString()
  @IsNotEmpty()
  specialization!: string;

  @IsString()
  department!: string;

  @IsString()
  phone!: string;

  @IsEmail()
  email!: string;

  @IsInt()
  @Min(0)
  yearsOfExperience!: number;

  @IsBoolean()
  acceptingNewPatients!: boolean;
}

export class DoctorCatalogDto {
  @ValidateNested({ each: true })
  @Type(() => DoctorSeedDto)
  @ArrayMinSize(1)
  doctors!: DoctorSeedDto[];
}

export class PatientPoolDto {
  @IsString({ each: true })
  @ArrayMinSize(1)
  insuranceProviders!: string[];

  @IsString()
  @Matches(/^[a-z0-9.-]+$/)
  emailDomain!: string;
}

export class UpcomingAppointmentDto {
  /** 1-based position of the patient in insertion order. */
  @IsInt()
  @Min(1)
  patientNumber!: number;

  /** 1-based position of the doctor in insertion order. */
  @IsInt()
  @Min(1)
  doctorNumber!: number;

  @IsInt()
  @Min(0)
  dayOffset!: number;

  @Matches(TIME_PATTERN)
  time!: string;

  @IsIn([...BOOKABLE_STATUSES])
  status!: AppointmentStatus;

  @IsString()
  reason!: string;

  @IsEnum(AppointmentType)
  type!: AppointmentType;

  @IsInt()
  @Min(0)
  createdDaysAgo!: number;

  @IsInt()
  @Min(0)
  updatedDaysAgo!: number;
}

export class UpcomingCatalogDto {
  @ValidateNested({ each: true })
  @Type(() => UpcomingAppointmentDto)
  appointments!: UpcomingAppointmentDto[];
}

export class ClinicalVocabularyDto {
  @IsString({ each: true })
  @ArrayMinSize(1)
  reasons!: string[];

  @IsString({ each: true })
  @ArrayMinSize(1)
  diagnoses!: string[];

  @IsString({ each: true })
  @ArrayMinSize(1)
  treatmentNotes!: string[];
}
