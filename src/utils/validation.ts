import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

/** Flattens nested class-validator errors into `path: message` strings. */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints || {}).map((message) => `${path}: ${message}`);
    return [...own, ...formatValidationErrors(error.children || [], path)];
  });
}

export interface ValidationOutcome<T> {
  value: T;
  errors: string[];
}

export async function transformAndValidate<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
): Promise<ValidationOutcome<T>> {
  const value = plainToInstance(cls, plain ?? {});
  const errors = await validate(value, { forbidUnknownValues: false });
  return { value, errors: formatValidationErrors(errors) };
}
