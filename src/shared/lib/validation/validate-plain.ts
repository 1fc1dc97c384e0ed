import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, ValidatorOptions, validateSync } from 'class-validator';

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; problems: string[] };

function flatten(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((err) => {
    const path = prefix ? `${prefix}.${err.property}` : err.property;
    const own = Object.values(err.constraints ?? {}).map((msg) => `${path}: ${msg}`);
    return [...own, ...flatten(err.children ?? [], path)];
  });
}

/**
 * Validates an untrusted plain value against a class-validator DTO.
 * Non-objects (arrays, strings, null) fail before the decorators run.
 */
export function validatePlain<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
  options?: ValidatorOptions,
): ValidationOutcome<T> {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    return { ok: false, problems: ['expected a JSON object'] };
  }

  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance, options);
  if (errors.length) return { ok: false, problems: flatten(errors) };

  return { ok: true, value: instance };
}
