import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and validate a JSON data file.
 * @returns The parsed contents, or undefined if the file does not exist yet
 * @throws {Error} naming the file if it is not valid JSON or fails the schema
 */
export function readJsonFile<T extends z.ZodTypeAny>(
  path: string,
  schema: T
): z.output<T> | undefined {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw err;
  }

  try {
    return schema.parse(JSON.parse(text));
  } catch (err) {
    if (err instanceof z.ZodError || err instanceof SyntaxError) {
      throw new Error(`Invalid data file ${path}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Replace a JSON data file. The contents go to a sibling temp file first,
 * so a crash mid-write leaves the previous file intact.
 */
export function writeJsonFile(path: string, data: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`);
  renameSync(tempPath, path);
}
