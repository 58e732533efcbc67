import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { DataFileError, readValidatedJson } from './data-files';
import { transformAndValidate } from './validation';
import { IsNotEmpty, IsString, Length } from 'class-validator';
import { DoctorCatalogDto } from '../dto/seed-catalog.dto';

class LocationDto {
  @IsString()
  @IsNotEmpty()
  city!: string;

  @Length(2, 2)
  state!: string;
}

describe('transformAndValidate', () => {
  it('should return the typed instance when valid', async () => {
    const { value, errors } = await transformAndValidate(LocationDto, { city: 'Springfield', state: 'IL' });
    expect(errors).toEqual([]);
    expect(value).toBeInstanceOf(LocationDto);
  });

  it('should prefix nested problems with their path', async () => {
    const { errors } = await transformAndValidate(DoctorCatalogDto, {
      doctors: [
        {
          firstName: 'Ana',
          lastName: 'Reyes',
          specialization: 'Cardiology',
          department: 'Cardiovascular',
          phone: '555-0000',
          email: 'not-an-email',
          yearsOfExperience: 4,
          acceptingNewPatients: true,
        },
      ],
    });
    expect(errors).toEqual(['doctors.0.email: email must be an email']);
  });

  it('should treat a missing body as an empty object', async () => {
    const { errors } = await transformAndValidate(LocationDto, undefined);
    expect([...errors].sort()).toEqual([
      'city: city must be a string',
      'city: city should not be empty',
      'state: state must be longer than or equal to 2 characters',
    ]);
  });
});

describe('readValidatedJson', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'clinic-data-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read and validate a data file', async () => {
    const file = path.join(dir, 'location.json');
    await writeFile(file, JSON.stringify({ city: 'Springfield', state: 'IL' }), 'utf8');
    await expect(readValidatedJson(file, LocationDto)).resolves.toEqual(
      Object.assign(new LocationDto(), { city: 'Springfield', state: 'IL' }),
    );
  });

  it('should name the file when the JSON does not parse', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ "city": ', 'utf8');
    const attempt = readValidatedJson(file, LocationDto);
    await expect(attempt).rejects.toBeInstanceOf(DataFileError);
    await expect(attempt).rejects.toThrow(/^broken\.json is invalid: /);
  });

  it('should list every validation problem', async () => {
    const file = path.join(dir, 'location.json');
    await writeFile(file, JSON.stringify({ city: 'Springfield', state: 'Illinois' }), 'utf8');
    await expect(readValidatedJson(file, LocationDto)).rejects.toThrow(
      'location.json is invalid: state: state must be shorter than or equal to 2 characters',
    );
  });
});
