import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { KitConfig } from '../config/configuration';
import {
  BookStepDto,
  CompleteStepDto,
  DoctorAvailabilityStepDto,
  ScenarioDto,
  ScenarioStep,
  SelectionStep,
  TransitionStepDto,
  VisitProfileDto,
} from '../dto/scenario.dto';
import {
  AppointmentCriteria,
  CLINIC_STORE,
  IClinicStore,
  NewVisit,
  StatusCount,
} from '../interfaces/clinic-store.interface';
import { Appointment } from '../models';
import { assertTransition, AppointmentStatus } from '../models/appointment-status';
import { addDays, addMinutes, combineDateTime, normalizeTime, toIsoDate } from '../utils/clinic-calendar';
import { CLOCK, Clock } from '../utils/clock';
import { DATA_DIR, DataFileError, readValidatedJson } from '../utils/data-files';

const SCENARIO_NAME = /^[a-z0-9][a-z0-9-]*$/;
const RECENT_ACTIVITY_LIMIT = 10;

export interface SimulationOptions {
  scenario?: string;
  pace?: number;
}

export interface SimulationStepOutcome {
  at: string;
  kind: ScenarioStep['kind'];
  description: string;
  appointmentIds: number[];
  visitIds?: number[];
  doctorId?: number;
}

export interface RecentAppointment {
  appointmentId: number;
  patientId: number;
  doctorId: number;
  appointmentDate: string;
  appointmentTime: string;
  status: string;
  updatedAt: Date | null;
}

export interface SimulationReport {
  runId: string;
  scenario: string;
  startedAt: Date;
  finishedAt: Date;
  steps: SimulationStepOutcome[];
  summary: {
    newAppointments: number;
    updatedAppointments: number;
    newVisits: number;
    updatedDoctors: number;
  };
  statusDistribution: StatusCount[];
  recentAppointments: RecentAppointment[];
}

/** Visit row for an appointment that just moved to `completed`. */
export function buildVisit(appointment: Appointment, profile: VisitProfileDto): NewVisit {
  const id = appointment.appointmentId;
  const start = combineDateTime(appointment.appointmentDate, appointment.appointmentTime);
  return {
    appointmentId: id,
    patientId: appointment.patientId,
    doctorId: appointment.doctorId,
    visitDate: appointment.appointmentDate,
    visitStartTime: start,
    visitEndTime: addMinutes(start, profile.durationMinutes),
    diagnosis: profile.diagnoses[id % profile.diagnoses.length],
    treatmentNotes: profile.treatmentNotes,
    followUpRequired: id % profile.followUpEvery === 0,
    prescriptionGiven: id % profile.prescriptionEvery === 0,
    totalCharge: profile.baseCharge + (id % profile.chargeCycle) * profile.chargeStep,
  };
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  constructor(
    @Inject(CLINIC_STORE) private readonly store: IClinicStore,
    private readonly configService: ConfigService<KitConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Resolves a scenario by bundled name (`clinic-morning`) or by a path to a
   * `.json` file, validates it and checks every transition against the
   * appointment lifecycle.
   */
  async loadScenario(reference: string, scenariosDir = path.join(DATA_DIR, 'scenarios')): Promise<ScenarioDto> {
    let file: string;
    if (reference.endsWith('.json')) {
      file = path.resolve(reference);
    } else if (SCENARIO_NAME.test(reference)) {
      file = path.join(scenariosDir, `${reference}.json`);
    } else {
      throw new Error(`Scenario "${reference}" is neither a scenario name nor a .json file`);
    }

    const scenario = await readValidatedJson(file, ScenarioDto);
    scenario.steps.forEach((step, index) => {
      if (step.kind !== 'transition') {
        return;
      }
      if (step.to === AppointmentStatus.COMPLETED) {
        throw new DataFileError(file, [`steps.${index}: use a "complete" step to move appointments to completed`]);
      }
      assertTransition(step.from, step.to);
    });
    return scenario;
  }

  async run(options: SimulationOptions = {}): Promise<SimulationReport> {
    const simulation = this.configService.get('simulation', { infer: true });
    const scenario = await this.loadScenario(options.scenario ?? simulation.scenario);
    const pace = options.pace ?? simulation.pace;
    const runId = uuidv4();
    const startedAt = this.clock.now();

    this.logger.log(`[${runId}] Starting scenario "${scenario.name}" (${scenario.steps.length} steps, pace ${pace})`);

    const steps: SimulationStepOutcome[] = [];
    for (const step of scenario.steps) {
      const outcome = await this.store.runInTransaction((store) => this.runStep(store, step));
      steps.push(outcome);
      this.logger.log(`[${runId}] ${step.at} ${step.description}: ${this.describeOutcome(outcome)}`);

      const pauseMs = (step.pauseSeconds ?? 0) * pace * 1000;
      if (pauseMs > 0) {
        await sleep(pauseMs);
      }
    }

    const statusDistribution = await this.store.statusDistribution();
    const recent = await this.store.findAppointmentsUpdatedSince(startedAt, RECENT_ACTIVITY_LIMIT);
    const finishedAt = this.clock.now();
    const summary = this.summarize(steps);
    this.logger.log(`[${runId}] Scenario finished: ${JSON.stringify(summary)}`);

    return {
      runId,
      scenario: scenario.name,
      startedAt,
      finishedAt,
      steps,
      summary,
      statusDistribution,
      recentAppointments: recent.map((appointment) => ({
        appointmentId: appointment.appointmentId,
        patientId: appointment.patientId,
        doctorId: appointment.doctorId,
        appointmentDate: appointment.appointmentDate,
        appointmentTime: appointment.appointmentTime,
        status: appointment.status,
        updatedAt: appointment.updatedAt,
      })),
    };
  }

  private async runStep(store: IClinicStore, step: ScenarioStep): Promise<SimulationStepOutcome> {
    const now = this.clock.now();
    switch (step.kind) {
      case 'book':
        return this.book(store, step, now);
      case 'transition':
        return this.transition(store, step, now);
      case 'complete':
        return this.complete(store, step, now);
      case 'doctor-availability':
        return this.updateDoctor(store, step, now);
    }
  }

  private async book(store: IClinicStore, step: BookStepDto, now: Date): Promise<SimulationStepOutcome> {
    const today = toIsoDate(now);
    const inserted = await store.insertAppointments(
      step.appointments.map((booking) => ({
        patientId: booking.patientId,
        doctorId: booking.doctorId,
        appointmentDate: addDays(today, booking.dayOffset),
        appointmentTime: normalizeTime(booking.time),
        status: booking.status,
        reasonForVisit: booking.reason,
        appointmentType: booking.type,
        createdAt: now,
        updatedAt: now,
      })),
    );
    return this.outcome(step, { appointmentIds: inserted.map((appointment) => appointment.appointmentId) });
  }

  private async transition(store: IClinicStore, step: TransitionStepDto, now: Date): Promise<SimulationStepOutcome> {
    const updated = await this.moveSelected(store, step, step.from, step.to, now);
    return this.outcome(step, { appointmentIds: updated.map((appointment) => appointment.appointmentId) });
  }

  private async complete(store: IClinicStore, step: CompleteStepDto, now: Date): Promise<SimulationStepOutcome> {
    const completed = await this.moveSelected(
      store,
      step,
      AppointmentStatus.IN_PROGRESS,
      AppointmentStatus.COMPLETED,
      now,
    );
    const visits = await store.insertVisits(completed.map((appointment) => buildVisit(appointment, step.visit)));
    return this.outcome(step, {
      appointmentIds: completed.map((appointment) => appointment.appointmentId),
      visitIds: visits.map((visit) => visit.visitId),
    });
  }

  private async updateDoctor(
    store: IClinicStore,
    step: DoctorAvailabilityStepDto,
    now: Date,
  ): Promise<SimulationStepOutcome> {
    const doctor = await store.setDoctorAvailability(step.doctorId, step.acceptingNewPatients, now);
    if (!doctor) {
      throw new Error(`Doctor ${step.doctorId} does not exist`);
    }
    return this.outcome(step, { appointmentIds: [], doctorId: doctor.doctorId });
  }

  private async moveSelected(
    store: IClinicStore,
    step: SelectionStep,
    from: AppointmentStatus,
    to: AppointmentStatus,
    now: Date,
  ): Promise<Appointment[]> {
    assertTransition(from, to);
    const candidates = await store.findAppointments(this.selectionCriteria(step, from, now));
    return store.updateAppointmentStatus(
      candidates.map((appointment) => appointment.appointmentId),
      from,
      to,
      now,
    );
  }

  selectionCriteria(step: SelectionStep, status: AppointmentStatus, now: Date): AppointmentCriteria {
    const criteria: AppointmentCriteria = { status };
    if (step.todayOnly) criteria.appointmentDate = toIsoDate(now);
    if (step.after !== undefined) criteria.timeAfter = normalizeTime(step.after);
    if (step.before !== undefined) criteria.timeBefore = normalizeTime(step.before);
    if (step.until !== undefined) criteria.timeUntil = normalizeTime(step.until);
    if (step.limit !== undefined) criteria.limit = step.limit;
    return criteria;
  }

  private outcome(
    step: ScenarioStep,
    result: Pick<SimulationStepOutcome, 'appointmentIds' | 'visitIds' | 'doctorId'>,
  ): SimulationStepOutcome {
    return { at: step.at, kind: step.kind, description: step.description, ...result };
  }

  private describeOutcome(outcome: SimulationStepOutcome): string {
    switch (outcome.kind) {
      case 'book':
        return `${outcome.appointmentIds.length} appointments booked`;
      case 'complete':
        return `${outcome.appointmentIds.length} visits completed, ${outcome.visitIds?.length ?? 0} visit records`;
      case 'doctor-availability':
        return `doctor ${outcome.doctorId ?? '?'} updated`;
      default:
        return `${outcome.appointmentIds.length} appointments updated`;
    }
  }

  private summarize(steps: SimulationStepOutcome[]): SimulationReport['summary'] {
    const updated = new Set<number>();
    const doctors = new Set<number>();
    let newAppointments = 0;
    let newVisits = 0;
    for (const step of steps) {
      if (step.kind === 'book') {
        newAppointments += step.appointmentIds.length;
      } else {
        step.appointmentIds.forEach((id) => updated.add(id));
      }
      newVisits += step.visitIds?.length ?? 0;
      if (step.doctorId !== undefined) {
        doctors.add(step.doctorId);
      }
    }
    return {
      newAppointments,
      updatedAppointments: updated.size,
      newVisits,
      updatedDoctors: doctors.size,
    };
  }
}
