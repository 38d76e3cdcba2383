/**
 * tierdata — Data store
 *
 * Reads and writes per-source data files. A source id is a path relative
 * to the data directory; `.json` sources are JSON, everything else YAML.
 *
 * Both formats are parsed by `yaml` with `intAsBigInt`, so a file that is
 * read and written back keeps every integer digit and keeps `1.0` a float.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Document, parse as parseYaml, visit } from 'yaml';
import type { DataSnapshot, DataValue, Result, ScalarPrimitive, SourceData, SourceId } from '../types.js';
import { invalidInput, ioError } from '../errors.js';
import { mapping, sourceDataFromPlain, sourceDataToPlain } from '../values/value.js';
import type { PlainOptions } from '../values/value.js';

const PARSED: PlainOptions = { integersAsBigInt: true };

/** File format of a source, decided by its extension. */
export type SourceFormat = 'json' | 'yaml';

/** Format of the file backing `source`. */
export function formatOf(source: SourceId): SourceFormat {
  return path.extname(source).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parse one source file's text into its data. Empty text is empty data. */
export function parseSourceText(source: SourceId, text: string): Result<SourceData> {
  let raw: unknown;
  try {
    raw = parseYaml(text, { intAsBigInt: true, schema: formatOf(source) === 'json' ? 'json' : 'core' });
  } catch (err: unknown) {
    return { ok: false, error: invalidInput(source, reasonOf(err)) };
  }

  const data = sourceDataFromPlain(raw, source, PARSED);
  if (!data.ok && data.error.code === 'INVALID_VALUE') {
    return { ok: false, error: invalidInput(source, data.error.reason) };
  }
  return data;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** A float whose plain rendering would read back as an integer. */
function isIntegralFloat(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && Math.abs(value) < 1e21;
}

function jsonScalar(value: ScalarPrimitive): string {
  if (typeof value === 'bigint') return String(value);
  if (isIntegralFloat(value)) return `${String(value)}.0`;
  return JSON.stringify(value);
}

/** Two-space indented JSON; bigints are written as plain digits. */
function jsonText(value: DataValue, indent: string): string {
  const inner = `${indent}  `;
  switch (value.kind) {
    case 'scalar':
      return jsonScalar(value.value);
    case 'sequence': {
      if (value.items.length === 0) return '[]';
      const items = value.items.map((item) => `${inner}${jsonText(item, inner)}`);
      return `[\n${items.join(',\n')}\n${indent}]`;
    }
    case 'mapping': {
      if (value.entries.size === 0) return '{}';
      const entries = [...value.entries].map(
        ([key, entry]) => `${inner}${JSON.stringify(key)}: ${jsonText(entry, inner)}`,
      );
      return `{\n${entries.join(',\n')}\n${indent}}`;
    }
  }
}

function yamlText(data: SourceData): string {
  const document = new Document(sourceDataToPlain(data, PARSED));
  visit(document, {
    Scalar(_key, node) {
      if (isIntegralFloat(node.value)) node.minFractionDigits = 1;
    },
  });
  return document.toString();
}

/** Render one source's data as file text. */
export function stringifySourceData(source: SourceId, data: SourceData): string {
  return formatOf(source) === 'json'
    ? `${jsonText(mapping(data), '')}\n`
    : yamlText(data);
}

/**
 * Read the data of every given source from `dataDir`.
 * A missing file is a source with no data.
 */
export async function readDataSnapshot(
  dataDir: string,
  sources: readonly SourceId[],
): Promise<Result<DataSnapshot>> {
  const snapshot = new Map<SourceId, SourceData>();

  for (const source of sources) {
    const file = path.resolve(dataDir, source);
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        snapshot.set(source, new Map());
        continue;
      }
      return { ok: false, error: ioError('read', file, reasonOf(err)) };
    }

    const data = parseSourceText(source, text);
    if (!data.ok) return data;
    snapshot.set(source, data.value);
  }

  return { ok: true, value: snapshot };
}

/**
 * Write the data of the given sources under `outputDir`, creating
 * directories as needed. Sources absent from the snapshot are written
 * as empty data.
 *
 * @returns The paths written, in `sources` order.
 */
export async function writeDataSnapshot(
  outputDir: string,
  snapshot: DataSnapshot,
  sources: readonly SourceId[],
): Promise<Result<string[]>> {
  const written: string[] = [];

  for (const source of sources) {
    const file = path.resolve(outputDir, source);
    const text = stringifySourceData(source, snapshot.get(source) ?? new Map());
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(file, text, 'utf8');
    } catch (err: unknown) {
      return { ok: false, error: ioError('write', file, reasonOf(err)) };
    }
    written.push(file);
  }

  return { ok: true, value: written };
}
