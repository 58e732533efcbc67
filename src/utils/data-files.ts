import { ClassConstructor } from 'class-transformer';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { transformAndValidate } from './validation';

/** Resolves the same way from `src/utils` and from `dist/utils`. */
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DATA_DIR = path.join(PROJECT_ROOT, 'data');
export const QUERIES_DIR = path.join(PROJECT_ROOT, 'queries');

export class DataFileError extends Error {
  constructor(
    public readonly file: string,
    public readonly problems: string[],
  ) {
    super(`${path.basename(file)} is invalid: ${problems.join('; ')}`);
    this.name = 'DataFileError';
  }
}

export async function readValidatedJson<T extends object>(file: string, cls: ClassConstructor<T>): Promise<T> {
  let plain: unknown;
  try {
    plain = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataFileError(file, [reason]);
  }

  const { value, errors } = await transformAndValidate(cls, plain);
  if (errors.length > 0) {
    throw new DataFileError(file, errors);
  }
  return value;
}
