import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { AppointmentStatus, AppointmentType, BOOKABLE_STATUSES } from '../models/appointment-status';
import { TIME_PATTERN } from './seed-catalog.dto';

export class BookedAppointmentDto {
  @IsInt()
  @Min(1)
  patientId!: number;

  @IsInt()
  @Min(1)
  doctorId!: number;

  /** Days from today; 0 books for today. */
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
}

export class VisitProfileDto {
  @IsInt()
  @Min(1)
  durationMinutes!: number;

  @IsString({ each: true })
  @ArrayMinSize(1)
  diagnoses!: string[];

  @IsString()
  treatmentNotes!: string;

  @IsInt()
  @Min(1)
  followUpEvery!: number;

  @IsInt()
  @Min(1)
  prescriptionEvery!: number;

  @IsNumber()
  @Min(0)
  baseCharge!: number;

  @IsNumber()
  @Min(0)
  chargeStep!: number;

  @IsInt()
  @Min(1)
  chargeCycle!: number;
}

export const SCENARIO_STEP_KINDS = ['book', 'transition', 'complete', 'doctor-availability'] as const;

export type ScenarioStepKind = (typeof SCENARIO_STEP_KINDS)[number];

abstract class ScenarioStepBaseDto {
  @IsIn([...SCENARIO_STEP_KINDS])
  kind!: ScenarioStepKind;

  /** Wall-clock label of the step in the scenario, e.g. `08:15`. */
  @Matches(/^([01]\d|2[0-3]):[0-5]\d$/)
  at!: string;

  @IsString()
  description!: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  pauseSeconds?: number;
}

export class BookStepDto extends ScenarioStepBaseDto {
  @IsIn(['book'])
  kind!: 'book';

  @ValidateNested({ each: true })
  @Type(() => BookedAppointmentDto)
  @ArrayMinSize(1)
  appointments!: BookedAppointmentDto[];
}

abstract class SelectionStepDto extends ScenarioStepBaseDto {
  @IsOptional()
  @IsBoolean()
  todayOnly?: boolean;

  @IsOptional()
  @Matches(TIME_PATTERN)
  after?: string;

  @IsOptional()
  @Matches(TIME_PATTERN)
  before?: string;

  @IsOptional()
  @Matches(TIME_PATTERN)
  until?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  limit?: number;
}

export class TransitionStepDto extends SelectionStepDto {
  @IsIn(['transition'])
  kind!: 'transition';

  @IsEnum(AppointmentStatus)
  from!: AppointmentStatus;

  @IsEnum(AppointmentStatus)
  to!: AppointmentStatus;
}

export class CompleteStepDto extends SelectionStepDto {
  @IsIn(['complete'])
  kind!: 'complete';

  @ValidateNested()
  @Type(() => VisitProfileDto)
  visit!: VisitProfileDto;
}

export class DoctorAvailabilityStepDto extends ScenarioStepBaseDto {
  @IsIn(['doctor-availability'])
  kind!: 'doctor-availability';

  @IsInt()
  @Min(1)
  doctorId!: number;

  @IsBoolean()
  acceptingNewPatients!: boolean;
}

export type ScenarioStep = BookStepDto | TransitionStepDto | CompleteStepDto | DoctorAvailabilityStepDto;

export type SelectionStep = TransitionStepDto | CompleteStepDto;

export class ScenarioDto {
  @IsString()
  name!: string;

  @IsString()
  description!: string;

  @ValidateNested({ each: true })
  @ArrayMinSize(1)
  @Type(() => ScenarioStepBaseDto, {
    discriminator: {
      property: 'kind',
      subTypes: [
        { value: BookStepDto, name: 'book' },
        { value: TransitionStepDto, name: 'transition' },
        { value: CompleteStepDto, name: 'complete' },
        { value: DoctorAvailabilityStepDto, name: 'doctor-availability' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  steps!: ScenarioStep[];
}
