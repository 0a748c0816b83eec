import type { ZodError } from 'zod';
import { SchemaValidationError } from '@graphgate/shared/src/utils/errors.js';
import { OracleConfigSchema } from './oracle-config.schema.js';
import type { OracleConfig } from './oracle-config.schema.js';
import { ConstraintSetSchema } from './constraint.schema.js';
import type { ConstraintSet } from './constraint.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateOracleConfig(data: unknown): OracleConfig {
  const result = OracleConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid oracle configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateConstraintSet(data: unknown): ConstraintSet {
  const result = ConstraintSetSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid constraint document', formatZodErrors(result.error));
  }

  return result.data;
}
