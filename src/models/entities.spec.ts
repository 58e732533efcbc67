import { getMetadataArgsStorage } from 'typeorm';
import { Appointment, Doctor, Patient, Visit } from '.';

const ENTITIES = { patients: Patient, doctors: Doctor, appointments: Appointment, visits: Visit };

type TableName = keyof typeof ENTITIES;

function columnOptions(table: TableName, propertyName: string) {
  const column = getMetadataArgsStorage().columns.find(
    (candidate) => candidate.target === ENTITIES[table] && candidate.propertyName === propertyName,
  );
  if (!column) {
    throw new Error(`No column ${table}.${propertyName}`);
  }
  return column.options;
}

describe('clinic entities', () => {
  it.each<[TableName, string]>([
    ['patients', 'registrationDate'],
    ['doctors', 'acceptingNewPatients'],
    ['doctors', 'updatedAt'],
    ['appointments', 'createdAt'],
    ['appointments', 'updatedAt'],
    ['visits', 'visitEndTime'],
    ['visits', 'followUpRequired'],
    ['visits', 'prescriptionGiven'],
  ])('leaves %s.%s nullable', (table, propertyName) => {
    expect(columnOptions(table, propertyName).nullable).toBe(true);
  });

  it.each<[TableName, string]>([
    ['patients', 'firstName'],
    ['patients', 'dateOfBirth'],
    ['doctors', 'specialization'],
    ['appointments', 'appointmentDate'],
    ['appointments', 'status'],
    ['visits', 'visitDate'],
    ['visits', 'visitStartTime'],
  ])('keeps %s.%s NOT NULL', (table, propertyName) => {
    expect(columnOptions(table, propertyName).nullable).toBeUndefined();
  });

  it('keeps the column defaults of the source tables', () => {
    expect(columnOptions('doctors', 'acceptingNewPatients').default).toBe(true);
    expect(columnOptions('visits', 'followUpRequired').default).toBe(false);
    expect(columnOptions('visits', 'prescriptionGiven').default).toBe(false);
  });
});
