/**
 * tierdata — Inputs
 *
 * Run options gathered from the command line and from YAML config files.
 * Sources are layered field by field: the command line first, then each
 * config file named by `--configs` in order, then the default config file.
 */

import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Result } from '../types.js';
import { invalidInput, ioError } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Run options; any field may be missing from a single layer. */
export interface Inputs {
  /** Path to the hierarchy file, or the hierarchy as inline YAML. */
  readonly hierarchy?: string | undefined;
  /** Path to the changes file, or the changes as inline YAML. */
  readonly changes?: string | undefined;
  readonly target?: string | undefined;
  readonly dataDir?: string | undefined;
  /** Further config files to read. */
  readonly configPaths: readonly string[];
  readonly outputDir?: string | undefined;
  /** Comma-delimited merge keys. */
  readonly mergeKeys?: string | undefined;
}

/** Inputs with every field a run needs. */
export interface RunInputs {
  readonly hierarchy: string;
  readonly changes: string;
  readonly target: string;
  readonly dataDir: string;
  readonly outputDir: string;
  readonly mergeKeys: ReadonlySet<string>;
}

/** Command-line arguments beyond the inputs themselves. */
export interface CliArguments {
  readonly inputs: Inputs;
  readonly help: boolean;
  readonly verbose: boolean;
}

/** Location of the config file that is always consulted when present. */
export function defaultConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.tierdata', 'config.yaml');
}

export const EMPTY_INPUTS: Inputs = Object.freeze({ configPaths: Object.freeze([]) });

// ---------------------------------------------------------------------------
// Layering
// ---------------------------------------------------------------------------

/**
 * Combine two layers; fields set in `primary` win. Config paths of both
 * layers are kept, `primary`'s first.
 */
export function fallingBackTo(primary: Inputs, fallback: Inputs): Inputs {
  return {
    hierarchy: primary.hierarchy ?? fallback.hierarchy,
    changes: primary.changes ?? fallback.changes,
    target: primary.target ?? fallback.target,
    dataDir: primary.dataDir ?? fallback.dataDir,
    configPaths: [...primary.configPaths, ...fallback.configPaths],
    outputDir: primary.outputDir ?? fallback.outputDir,
    mergeKeys: primary.mergeKeys ?? fallback.mergeKeys,
  };
}

/** Combine two layers; fields set in `overrides` win. */
export function overriddenWith(base: Inputs, overrides: Inputs): Inputs {
  return fallingBackTo(overrides, base);
}

/** Split a comma-delimited key list, dropping blanks. */
export function parseMergeKeys(value: string | undefined): ReadonlySet<string> {
  if (value === undefined) return new Set();
  return new Set(
    value
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key !== ''),
  );
}

/**
 * Check that every field a run needs is present.
 * The output directory defaults to the data directory.
 */
export function requireRunInputs(inputs: Inputs): Result<RunInputs> {
  const { hierarchy, changes, target, dataDir } = inputs;
  if (hierarchy === undefined) {
    return { ok: false, error: invalidInput('hierarchy', 'is required (--hierarchy)') };
  }
  if (changes === undefined) {
    return { ok: false, error: invalidInput('changes', 'is required (--changes)') };
  }
  if (target === undefined) {
    return { ok: false, error: invalidInput('target', 'is required (--target)') };
  }
  if (dataDir === undefined) {
    return { ok: false, error: invalidInput('dataDir', 'is required (--data-dir)') };
  }
  return {
    ok: true,
    value: {
      hierarchy,
      changes,
      target,
      dataDir,
      outputDir: inputs.outputDir ?? dataDir,
      mergeKeys: parseMergeKeys(inputs.mergeKeys),
    },
  };
}

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

/**
 * Parse command-line arguments (without the node and script entries).
 * `--configs` takes every path up to the next option, so both
 * `--configs a.yaml b.yaml` and `--configs a.yaml --configs b.yaml` work.
 * Unknown options and other positionals are INVALID_INPUT.
 */
export function inputsFromArgs(argv: readonly string[]): Result<CliArguments> {
  try {
    const { values, tokens } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      tokens: true,
      options: {
        hierarchy: { type: 'string', short: 'h' },
        changes: { type: 'string', short: 'c' },
        target: { type: 'string', short: 't' },
        'data-dir': { type: 'string', short: 'd' },
        configs: { type: 'string', multiple: true },
        'output-dir': { type: 'string', short: 'o' },
        'merge-keys': { type: 'string', short: 'm' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: '?' },
      },
    });

    const configPaths: string[] = [];
    let inConfigs = false;
    for (const token of tokens) {
      if (token.kind === 'option') {
        inConfigs = token.name === 'configs';
        if (inConfigs && token.value !== undefined) configPaths.push(token.value);
      } else if (token.kind === 'option-terminator') {
        inConfigs = false;
      } else if (inConfigs) {
        configPaths.push(token.value);
      } else {
        return {
          ok: false,
          error: invalidInput('arguments', `Unexpected argument '${token.value}'. Only --configs takes several values`),
        };
      }
    }

    return {
      ok: true,
      value: {
        inputs: {
          hierarchy: values.hierarchy,
          changes: values.changes,
          target: values.target,
          dataDir: values['data-dir'],
          configPaths,
          outputDir: values['output-dir'],
          mergeKeys: values['merge-keys'],
        },
        help: values.help ?? false,
        verbose: values.verbose ?? false,
      },
    };
  } catch (err: unknown) {
    return { ok: false, error: invalidInput('arguments', err instanceof Error ? err.message : String(err)) };
  }
}

// ---------------------------------------------------------------------------
// Config files
// ---------------------------------------------------------------------------

function camelCase(key: string): string {
  return key.replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

const optionalString = z.string().min(1).optional();

/** Config file fields; kebab-case keys are accepted as well. */
const ConfigFileSchema = z.preprocess(
  (raw) => {
    if (raw === null || raw === undefined) return {};
    if (typeof raw !== 'object' || Array.isArray(raw)) return raw;
    return Object.fromEntries(Object.entries(raw).map(([key, value]) => [camelCase(key), value]));
  },
  z
    .object({
      hierarchy: optionalString,
      changes: optionalString,
      target: optionalString,
      dataDir: optionalString,
      outputDir: optionalString,
      mergeKeys: z.union([z.string(), z.array(z.string())]).optional(),
    })
    .strict(),
);

/**
 * Read one config file.
 *
 * Relative `dataDir` and `outputDir` values are resolved against the
 * file's directory.
 *
 * @param optional - When true, a missing file yields empty inputs instead of an error.
 */
export async function inputsFromConfigFile(configPath: string, optional = false): Promise<Result<Inputs>> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err: unknown) {
    if (optional && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ok: true, value: EMPTY_INPUTS };
    }
    return {
      ok: false,
      error: ioError('read config file', configPath, err instanceof Error ? err.message : String(err)),
    };
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    return { ok: false, error: invalidInput(configPath, err instanceof Error ? err.message : String(err)) };
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue === undefined
      ? 'invalid config file'
      : `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`;
    return { ok: false, error: invalidInput(configPath, reason) };
  }

  const config = parsed.data;
  const baseDir = path.dirname(configPath);
  const mergeKeys = Array.isArray(config.mergeKeys) ? config.mergeKeys.join(',') : config.mergeKeys;

  return {
    ok: true,
    value: {
      hierarchy: config.hierarchy,
      changes: config.changes,
      target: config.target,
      dataDir: config.dataDir === undefined ? undefined : path.resolve(baseDir, config.dataDir),
      configPaths: [],
      outputDir: config.outputDir === undefined ? undefined : path.resolve(baseDir, config.outputDir),
      mergeKeys,
    },
  };
}

/**
 * Layer command-line inputs over the config files they name and the
 * default config file.
 */
export async function loadInputs(cli: Inputs, homeDir?: string): Promise<Result<Inputs>> {
  let inputs = cli;
  for (const configPath of cli.configPaths) {
    const layer = await inputsFromConfigFile(configPath);
    if (!layer.ok) return layer;
    inputs = fallingBackTo(inputs, layer.value);
  }

  const defaults = await inputsFromConfigFile(defaultConfigPath(homeDir), true);
  if (!defaults.ok) return defaults;
  return { ok: true, value: fallingBackTo(inputs, defaults.value) };
}
