/**
 * tierdata — Document reading
 *
 * Hierarchy and changes inputs are given either as a path to a YAML/JSON
 * file or as inline YAML. A string naming an existing file is read;
 * anything else is parsed as YAML itself.
 */

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { parseAllDocuments } from 'yaml';
import type { Result } from '../types.js';
import { invalidInput, ioError } from '../errors.js';

/** Parsed documents and where they came from. */
export interface LoadedDocuments {
  /** The resolved file path, or undefined for inline YAML. */
  readonly path: string | undefined;
  readonly documents: readonly unknown[];
}

/**
 * Parse every document of a YAML stream. JSON is valid YAML, so JSON
 * text parses here too. Integers come back as bigint.
 *
 * @param field - Names the input in INVALID_INPUT errors.
 */
export function parseYamlDocuments(text: string, field: string): Result<unknown[]> {
  const documents = parseAllDocuments(text, { intAsBigInt: true });
  const values: unknown[] = [];
  for (const document of documents) {
    const error = document.errors[0];
    if (error !== undefined) {
      return { ok: false, error: invalidInput(field, error.message) };
    }
    values.push(document.toJS());
  }
  return { ok: true, value: values };
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/** The first existing file among `pathOrYaml` itself and `pathOrYaml` under each base directory. */
export async function findFile(pathOrYaml: string, baseDirs: readonly string[]): Promise<string | undefined> {
  // Inline YAML spanning lines is never a path.
  if (pathOrYaml.includes('\n')) return undefined;

  const candidates = path.isAbsolute(pathOrYaml)
    ? [pathOrYaml]
    : baseDirs.map((dir) => path.resolve(dir, pathOrYaml));

  for (const candidate of candidates) {
    if (await isFile(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Read an input given as a file path or inline YAML.
 *
 * @param pathOrYaml - The option value.
 * @param baseDirs - Directories relative paths are tried against, in order.
 * @param field - Names the input in errors.
 */
export async function readDocuments(
  pathOrYaml: string,
  baseDirs: readonly string[],
  field: string,
): Promise<Result<LoadedDocuments>> {
  const file = await findFile(pathOrYaml, baseDirs);

  let text = pathOrYaml;
  if (file !== undefined) {
    try {
      text = await readFile(file, 'utf8');
    } catch (err: unknown) {
      return {
        ok: false,
        error: ioError('read', file, err instanceof Error ? err.message : String(err)),
      };
    }
  }

  const documents = parseYamlDocuments(text, field);
  if (!documents.ok) return documents;
  return { ok: true, value: { path: file, documents: documents.value } };
}
