import { access, mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { dirname, join } from 'node:path';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export function isNotFound(cause: unknown): boolean {
  return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
}

/** Document ids become directory names, so anything that could escape the root is refused. */
export function checkDocumentId(documentId: string): Result<string, AppError> {
  if (documentId.length === 0 || documentId === '.' || documentId === '..' || /[/\\\0]/.test(documentId)) {
    return err(createAppError(ErrorCode.VALIDATION_ERROR, `Invalid document id: ${JSON.stringify(documentId)}`, false));
  }
  return ok(documentId);
}

export async function readTextIfExists(path: string): Promise<Result<string | null, AppError>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (cause) {
    if (isNotFound(cause)) return ok(null);
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, `Failed to read ${path}`, true, details));
  }
}

export async function readJsonIfExists(path: string): Promise<Result<unknown, AppError>> {
  const text = await readTextIfExists(path);
  if (!text.ok || text.value === null) return text;

  try {
    const parsed: unknown = JSON.parse(text.value);
    return ok(parsed);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.RECORD_INVALID, `${path} is not valid JSON`, false, details));
  }
}

/** Writes through a temporary sibling so readers never see a half-written file. */
export async function writeFileAtomic(path: string, content: string): Promise<Result<void, AppError>> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
    return ok(undefined);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, `Failed to write ${path}`, true, details));
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Sub-directories of `root` that contain `marker`, sorted. A missing root is empty. */
export async function listDocumentDirs(root: string, marker: string): Promise<Result<string[], AppError>> {
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (cause) {
    if (isNotFound(cause)) return ok([]);
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, `Failed to list ${root}`, true, details));
  }

  const ids: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (await exists(join(root, entry.name, marker))) ids.push(entry.name);
  }
  return ok(ids.sort());
}
