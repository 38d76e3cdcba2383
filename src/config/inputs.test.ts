/**
 * tierdata — Inputs tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  EMPTY_INPUTS,
  defaultConfigPath,
  fallingBackTo,
  inputsFromArgs,
  inputsFromConfigFile,
  loadInputs,
  overriddenWith,
  parseMergeKeys,
  requireRunInputs,
} from './inputs.js';
import type { Inputs } from './inputs.js';
import { unwrap } from '../../tests/helpers/data.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'tierdata-inputs-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

describe('inputsFromArgs', () => {
  it('reads short and long options', () => {
    const args = unwrap(inputsFromArgs([
      '-h', 'hierarchy.yaml',
      '--changes', 'changes.yaml',
      '-t', 'teams/a.yaml',
      '--data-dir', 'data',
      '--configs', 'one.yaml',
      '--configs', 'two.yaml',
      '-o', 'out',
      '-m', 'tags,env',
      '-v',
    ]));

    expect(args).toEqual({
      inputs: {
        hierarchy: 'hierarchy.yaml',
        changes: 'changes.yaml',
        target: 'teams/a.yaml',
        dataDir: 'data',
        configPaths: ['one.yaml', 'two.yaml'],
        outputDir: 'out',
        mergeKeys: 'tags,env',
      },
      help: false,
      verbose: true,
    });
  });

  it('recognises --help', () => {
    expect(unwrap(inputsFromArgs(['--help'])).help).toBe(true);
  });

  it('rejects unknown options', () => {
    const result = inputsFromArgs(['--colour', 'blue']);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ code: 'INVALID_INPUT', field: 'arguments' });
  });

  it('takes several paths after one --configs', () => {
    const args = unwrap(inputsFromArgs(['--configs', 'one.yaml', 'two.yaml', '-t', 'dev', '--configs', 'three.yaml']));
    expect(args.inputs.configPaths).toEqual(['one.yaml', 'two.yaml', 'three.yaml']);
    expect(args.inputs.target).toBe('dev');
  });

  it('rejects positional arguments', () => {
    const result = inputsFromArgs(['teams/a.yaml']);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_INPUT',
        field: 'arguments',
        reason: "Unexpected argument 'teams/a.yaml'. Only --configs takes several values",
      },
    });
  });

  it('rejects a positional that follows another option', () => {
    const result = inputsFromArgs(['--configs', 'one.yaml', '-v', 'two.yaml']);
    expect(result.ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Layering
// ---------------------------------------------------------------------------

describe('fallingBackTo', () => {
  const primary: Inputs = { target: 'dev', configPaths: ['a.yaml'] };
  const fallback: Inputs = { target: 'prod', dataDir: 'data', configPaths: ['b.yaml'] };

  it('prefers the primary layer field by field', () => {
    const inputs = fallingBackTo(primary, fallback);
    expect(inputs.target).toBe('dev');
    expect(inputs.dataDir).toBe('data');
    expect(inputs.configPaths).toEqual(['a.yaml', 'b.yaml']);
  });

  it('is mirrored by overriddenWith', () => {
    expect(overriddenWith(fallback, primary)).toEqual(fallingBackTo(primary, fallback));
  });
});

describe('parseMergeKeys', () => {
  it('splits on commas and drops blanks', () => {
    expect([...parseMergeKeys(' tags, ,env ,')]).toEqual(['tags', 'env']);
  });

  it('is empty when unset', () => {
    expect(parseMergeKeys(undefined).size).toBe(0);
  });
});

describe('requireRunInputs', () => {
  const complete: Inputs = {
    hierarchy: 'h.yaml',
    changes: 'c.yaml',
    target: 'dev',
    dataDir: 'data',
    configPaths: [],
    mergeKeys: 'tags',
  };

  it('defaults the output directory to the data directory', () => {
    const run = unwrap(requireRunInputs(complete));
    expect(run.outputDir).toBe('data');
    expect([...run.mergeKeys]).toEqual(['tags']);
  });

  it('names the first missing field', () => {
    expect(requireRunInputs({ ...complete, target: undefined })).toEqual({
      ok: false,
      error: { code: 'INVALID_INPUT', field: 'target', reason: 'is required (--target)' },
    });
    expect(requireRunInputs(EMPTY_INPUTS)).toEqual({
      ok: false,
      error: { code: 'INVALID_INPUT', field: 'hierarchy', reason: 'is required (--hierarchy)' },
    });
  });
});

// ---------------------------------------------------------------------------
// Config files
// ---------------------------------------------------------------------------

describe('inputsFromConfigFile', () => {
  it('reads kebab-case and camelCase keys and resolves directories against the file', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'data-dir: data\noutputDir: /abs/out\nmerge-keys: [tags, env]\ntarget: dev\n');

    expect(unwrap(await inputsFromConfigFile(file))).toEqual({
      hierarchy: undefined,
      changes: undefined,
      target: 'dev',
      dataDir: path.join(dir, 'data'),
      configPaths: [],
      outputDir: path.resolve('/abs/out'),
      mergeKeys: 'tags,env',
    });
  });

  it('accepts an empty file', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, '');
    expect(unwrap(await inputsFromConfigFile(file)).target).toBeUndefined();
  });

  it('rejects unknown keys', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'colour: blue\n');
    const result = await inputsFromConfigFile(file);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ code: 'INVALID_INPUT', field: file });
  });

  it('fails for a missing file unless it is optional', async () => {
    const file = path.join(dir, 'missing.yaml');
    expect(await inputsFromConfigFile(file, true)).toEqual({ ok: true, value: EMPTY_INPUTS });

    const result = await inputsFromConfigFile(file);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ code: 'IO_ERROR', path: file });
  });
});

describe('loadInputs', () => {
  it('layers the command line over named config files and the default one', async () => {
    const named = path.join(dir, 'named.yaml');
    await writeFile(named, 'target: team\ndata-dir: data\n');
    await mkdir(path.join(dir, 'home', '.tierdata'), { recursive: true });
    await writeFile(defaultConfigPath(path.join(dir, 'home')), 'target: prod\nchanges: changes.yaml\n');

    const inputs = unwrap(await loadInputs({ target: 'dev', configPaths: [named] }, path.join(dir, 'home')));

    expect(inputs.target).toBe('dev');
    expect(inputs.dataDir).toBe(path.join(dir, 'data'));
    expect(inputs.changes).toBe('changes.yaml');
    expect(inputs.configPaths).toEqual([named]);
  });

  it('works without a default config file', async () => {
    const inputs = unwrap(await loadInputs({ target: 'dev', configPaths: [] }, path.join(dir, 'nobody')));
    expect(inputs.target).toBe('dev');
  });
});
