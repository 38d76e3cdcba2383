/**
 * tierdata — Command-line interface
 *
 * Loads the hierarchy, changes and existing data, resolves the target's
 * subtree and writes the rewritten sources to the output directory.
 */

import path from 'node:path';
import type { Result, TierdataError } from '../types.js';
import { formatError } from '../errors.js';
import { inputsFromArgs, loadInputs, requireRunInputs } from '../config/inputs.js';
import type { RunInputs } from '../config/inputs.js';
import { readDocuments } from '../io/documents.js';
import { parseChanges } from '../io/changes-loader.js';
import { readDataSnapshot, writeDataSnapshot } from '../io/data-store.js';
import { parseHierarchy } from '../hierarchy/hierarchy-parser.js';
import { resolve } from '../resolver/resolver.js';
import { ConsoleLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

/** Exit codes returned by {@link runCli}. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: tierdata --hierarchy <path|yaml> --changes <path|yaml> --target <source>
                --data-dir <path> [--output-dir <path>] [--merge-keys <k1,k2>]
                [--configs <path>...] [--verbose] [--help]

Options:
  -h, --hierarchy <path|yaml>  Source hierarchy, as a YAML file relative to the
                               working or data directory, or inline YAML. Nesting
                               denotes inheritance, e.g.
                                 global.yaml:
                                   teams/myteam.yaml:
                                     - teams/myteam/dev.yaml
                                     - teams/myteam/prod.yaml
  -c, --changes <path|yaml>    Desired end-state changes: YAML documents of
                               {source, set, remove}.
  -t, --target <source>        Source at and below which data is rewritten.
                               Redundant keys beneath it are removed.
  -d, --data-dir <path>        Directory holding the existing source files.
  -o, --output-dir <path>      Directory the rewritten sources are written to.
                               Defaults to the data directory.
  -m, --merge-keys <k1,k2>     Keys inherited as the union of every ancestor's
                               value instead of the nearest one.
      --configs <path>...      Config files supplying option defaults, earlier
                               ones winning. Takes every path up to the next
                               option and may be repeated.
                               ~/.tierdata/config.yaml is always read last
                               when present.
  -v, --verbose                Log each step.
  -?, --help                   Show this text.
`;

export interface CliOptions {
  /** Logger for progress and errors. Default: a ConsoleLogger. */
  readonly logger?: Logger | undefined;
  /** Prints the help text. Default: console.log. */
  readonly print?: ((text: string) => void) | undefined;
  /** Home directory holding the default config file. */
  readonly homeDir?: string | undefined;
  /** Directory relative inputs are resolved against. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

/** Summary of a successful run. */
export interface RunReport {
  readonly target: string;
  readonly written: readonly string[];
}

/**
 * Load, resolve and write. Every failure is returned, never thrown.
 */
export async function run(inputs: RunInputs, logger: Logger, cwd: string): Promise<Result<RunReport, TierdataError>> {
  const dataDir = path.resolve(cwd, inputs.dataDir);
  const outputDir = path.resolve(cwd, inputs.outputDir);
  const baseDirs = [cwd, dataDir];

  const hierarchyDocs = await readDocuments(inputs.hierarchy, baseDirs, 'hierarchy');
  if (!hierarchyDocs.ok) return hierarchyDocs;
  const hierarchy = parseHierarchy(hierarchyDocs.value.documents[0]);
  if (!hierarchy.ok) return hierarchy;
  logger.debug('Loaded hierarchy', {
    from: hierarchyDocs.value.path ?? 'inline',
    sources: hierarchy.value.sources().length,
  });

  const changeDocs = await readDocuments(inputs.changes, baseDirs, 'changes');
  if (!changeDocs.ok) return changeDocs;
  const changes = parseChanges(changeDocs.value.documents, { integersAsBigInt: true });
  if (!changes.ok) return changes;
  logger.debug('Loaded changes', {
    from: changeDocs.value.path ?? 'inline',
    changes: changes.value.length,
  });

  const data = await readDataSnapshot(dataDir, hierarchy.value.sources());
  if (!data.ok) return data;

  const resolved = resolve({
    hierarchy: hierarchy.value,
    changes: changes.value,
    target: inputs.target,
    data: data.value,
    mergeKeys: inputs.mergeKeys,
  });
  if (!resolved.ok) return resolved;

  // Resolution succeeded, so the target is known.
  const subtree = hierarchy.value.descendantsOf(inputs.target) ?? [];
  const written = await writeDataSnapshot(outputDir, resolved.value, subtree);
  if (!written.ok) return written;

  return { ok: true, value: { target: inputs.target, written: written.value } };
}

/**
 * Run the command line.
 *
 * @param argv - Arguments without the node and script entries.
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], options?: CliOptions): Promise<number> {
  const print = options?.print ?? ((text: string) => console.log(text));
  const args = inputsFromArgs(argv);

  if (!args.ok) {
    const logger = options?.logger ?? new ConsoleLogger();
    logger.error(formatError(args.error));
    print(USAGE);
    return EXIT_USAGE;
  }

  if (args.value.help) {
    print(USAGE);
    return EXIT_OK;
  }

  const logger = options?.logger ?? new ConsoleLogger({ minLevel: args.value.verbose ? 'debug' : 'info' });
  const cwd = options?.cwd ?? process.cwd();

  const cliInputs = {
    ...args.value.inputs,
    configPaths: args.value.inputs.configPaths.map((configPath) => path.resolve(cwd, configPath)),
  };
  const inputs = await loadInputs(cliInputs, options?.homeDir);
  if (!inputs.ok) {
    logger.error(formatError(inputs.error));
    return EXIT_FAILURE;
  }

  const required = requireRunInputs(inputs.value);
  if (!required.ok) {
    logger.error(formatError(required.error));
    print(USAGE);
    return EXIT_USAGE;
  }

  const report = await run(required.value, logger, cwd);
  if (!report.ok) {
    logger.error(formatError(report.error), { code: report.error.code });
    return EXIT_FAILURE;
  }

  for (const file of report.value.written) {
    logger.info(`Wrote ${file}`);
  }
  logger.info(`Updated ${String(report.value.written.length)} source(s) at and below ${report.value.target}`);
  return EXIT_OK;
}
