import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLINIC_STORE, IClinicStore, IntegrityFacts } from '../interfaces/clinic-store.interface';
import { CLINIC_TABLES, ClinicTable } from '../models';
import { APPOINTMENT_STATUSES } from '../models/appointment-status';

export const INTEGRITY_MODES = ['snapshot', 'live'] as const;

export type IntegrityMode = (typeof INTEGRITY_MODES)[number];

export interface IntegrityCheck {
  name: string;
  description: string;
  expected: string;
  actual: number;
  passed: boolean;
}

export interface IntegrityReport {
  mode: IntegrityMode;
  passed: boolean;
  checks: IntegrityCheck[];
}

interface VolumeExpectation {
  exact: boolean;
  rows: number;
}

/** Seed volumes. Live activity only ever adds appointments and visits. */
const VOLUMES: Record<ClinicTable, VolumeExpectation> = {
  patients: { exact: true, rows: 100 },
  doctors: { exact: true, rows: 10 },
  appointments: { exact: false, rows: 170 },
  visits: { exact: false, rows: 100 },
};

function zero(name: string, description: string, actual: number): IntegrityCheck {
  return { name, description, expected: '0', actual, passed: actual === 0 };
}

export function evaluateIntegrity(facts: IntegrityFacts, mode: IntegrityMode): IntegrityReport {
  const volumeChecks = CLINIC_TABLES.map((table): IntegrityCheck => {
    const { exact, rows } = VOLUMES[table];
    const atLeast = mode === 'live' && !exact;
    const actual = facts.counts[table];
    return {
      name: `row-count:${table}`,
      description: `Row count of ${table}`,
      expected: atLeast ? `>= ${rows}` : `${rows}`,
      actual,
      passed: atLeast ? actual >= rows : actual === rows,
    };
  });

  const statusTotal = facts.statusDistribution.reduce((sum, entry) => sum + entry.count, 0);

  const checks: IntegrityCheck[] = [
    ...volumeChecks,
    zero('null:patient-names', 'Patients with a NULL first or last name', facts.patientsWithNullNames),
    zero('null:doctor-names', 'Doctors with a NULL first or last name', facts.doctorsWithNullNames),
    zero(
      'null:appointment-schedule',
      'Appointments with a NULL date or time',
      facts.appointmentsWithNullSchedule,
    ),
    zero('null:visit-charges', 'Visits with a NULL total charge', facts.visitsWithNullCharge),
    zero(
      'status:enumeration',
      `Appointments whose status is outside ${APPOINTMENT_STATUSES.join(', ')}`,
      facts.appointmentsWithUnknownStatus,
    ),
    zero(
      'visit:completed-appointment',
      'Visits whose appointment is not completed',
      facts.visitsForIncompleteAppointments,
    ),
    zero('visit:one-per-appointment', 'Appointments with more than one visit', facts.appointmentsWithDuplicateVisits),
    {
      name: 'status:sum-matches-total',
      description: 'Sum of per-status appointment counts',
      expected: `${facts.counts.appointments}`,
      actual: statusTotal,
      passed: statusTotal === facts.counts.appointments,
    },
    zero('visit:non-negative-charge', 'Visits with a negative total charge', facts.visitsWithNegativeCharge),
    zero(
      'visit:matches-appointment',
      "Visits whose patient or doctor differs from the appointment's",
      facts.visitsWithMismatchedParties,
    ),
  ];

  return { mode, passed: checks.every((check) => check.passed), checks };
}

@Injectable()
export class IntegrityService {
  private readonly logger = new Logger(IntegrityService.name);

  constructor(@Inject(CLINIC_STORE) private readonly store: IClinicStore) {}

  async verify(mode: IntegrityMode = 'snapshot'): Promise<IntegrityReport> {
    const facts = await this.store.collectIntegrityFacts();
    const report = evaluateIntegrity(facts, mode);

    const failed = report.checks.filter((check) => !check.passed);
    if (failed.length === 0) {
      this.logger.log(`All ${report.checks.length} ${mode} integrity checks passed`);
    } else {
      for (const check of failed) {
        this.logger.warn(`${check.name}: expected ${check.expected}, got ${check.actual}`);
      }
    }
    return report;
  }
}
