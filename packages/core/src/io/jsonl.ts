import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { formatZodErrors } from '@graphgate/schemas/src/validators.js';
import { DataFormatError, toError } from '@graphgate/shared/src/utils/errors.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';

const log = createChildLogger('io:jsonl');

/**
 * Parses one JSON document per line and validates each against the schema.
 * Blank lines are skipped; line numbers in errors are 1-based.
 */
export function parseJsonLines<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  source = '<input>',
): z.output<T>[] {
  const rows: z.output<T>[] = [];
  const lines = content.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    if (line.trim().length === 0) continue;
    const lineNumber = index + 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new DataFormatError(
        `Invalid JSON in ${source} at line ${String(lineNumber)}: ${toError(error).message}`,
        lineNumber,
        toError(error),
      );
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new DataFormatError(
        `Invalid record in ${source} at line ${String(lineNumber)}: ${formatZodErrors(result.error).join('; ')}`,
        lineNumber,
      );
    }
    rows.push(result.data);
  }

  return rows;
}

export async function readJsonLines<T extends z.ZodTypeAny>(
  path: string,
  schema: T,
): Promise<z.output<T>[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DataFormatError(`Failed to read ${path}: ${toError(error).message}`, undefined, toError(error));
  }

  const rows = parseJsonLines(content, schema, path);
  log.debug({ path, rows: rows.length }, 'Read JSON lines');
  return rows;
}

export function serializeJsonLines(rows: readonly unknown[]): string {
  return rows.map((row) => `${JSON.stringify(row)}\n`).join('');
}

export async function writeJsonLines(path: string, rows: readonly unknown[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeJsonLines(rows), 'utf-8');
  log.info({ path, rows: rows.length }, 'Wrote JSON lines');
}
