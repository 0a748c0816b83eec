import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import {
  ConfigurationError,
  ConstraintLoadError,
  SchemaValidationError,
  toError,
} from '@graphgate/shared/src/utils/errors.js';
import { validateConstraintSet, validateOracleConfig } from './validators.js';
import type { OracleConfig } from './oracle-config.schema.js';
import type { ConstraintSet } from './constraint.schema.js';

export const CONFIG_FILE_NAME = 'oracle.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${toError(error).message}`,
    );
  }
}

function resolveRelative(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Loads `oracle.json` from the config directory. Graph and constraint paths
 * are resolved against that directory.
 */
export async function loadOracleConfig(configDir: string): Promise<OracleConfig> {
  const raw = await readJsonFile(join(configDir, CONFIG_FILE_NAME));
  const config = validateOracleConfig(raw);

  return {
    ...config,
    graphPath: resolveRelative(configDir, config.graphPath),
    constraintsPath:
      config.constraintsPath === undefined
        ? undefined
        : resolveRelative(configDir, config.constraintsPath),
  };
}

export async function loadConstraints(path: string): Promise<ConstraintSet> {
  let raw: unknown;
  try {
    raw = await readJsonFile(path);
  } catch (error) {
    throw new ConstraintLoadError(toError(error).message, path, toError(error));
  }

  try {
    return validateConstraintSet(raw);
  } catch (error) {
    const details =
      error instanceof SchemaValidationError ? `: ${error.validationErrors.join('; ')}` : '';
    throw new ConstraintLoadError(`Malformed constraint document ${path}${details}`, path, toError(error));
  }
}
