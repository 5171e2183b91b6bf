/**
 * JSON documents written with temp-file-then-rename in the target's own
 * directory, so readers see either the old document or the new one.
 *
 * @module storage/atomic-json
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { ZodTypeAny, z } from 'zod';
import { errnoCode } from '../errors.js';

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });

  const tempPath = join(
    dir,
    `.${basename(path)}-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`,
  );

  try {
    await writeFile(tempPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

export type JsonReadResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/**
 * Read and validate a JSON document. Only unexpected I/O errors reject.
 */
export async function readJson<S extends ZodTypeAny>(
  path: string,
  schema: S,
): Promise<JsonReadResult<z.output<S>>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return { status: 'missing' };
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return { status: 'invalid', reason: 'not valid JSON' };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      status: 'invalid',
      reason: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch',
    };
  }
  return { status: 'ok', value: result.data };
}
