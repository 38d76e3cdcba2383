/**
 * tierdata — Changes loader
 *
 * Builds Change objects from parsed documents. A changes input is either
 * a stream of YAML documents holding one change each, or documents that
 * hold a list of changes:
 *
 *   ---
 *   source: teams/myteam.yaml
 *   set:
 *     myapp::version: 2
 *   ---
 *   source: teams/myteam/stage.yaml
 *   remove: [myapp::debug]
 */

import type { Change, Result } from '../types.js';
import { changeFromRecord } from '../changes/change.js';
import type { PlainOptions } from '../values/value.js';

/**
 * Parse changes from documents, keeping their order.
 * Empty documents are skipped; a null record inside a list is not.
 * Documents from `parseYamlDocuments` carry bigint integers; pass
 * `{ integersAsBigInt: true }` for them.
 */
export function parseChanges(documents: readonly unknown[], options: PlainOptions = {}): Result<Change[]> {
  const changes: Change[] = [];
  for (const document of documents) {
    if (document === null || document === undefined) continue;

    const records: readonly unknown[] = Array.isArray(document) ? document : [document];
    for (const record of records) {
      const change = changeFromRecord(record, changes.length, options);
      if (!change.ok) return change;
      changes.push(change.value);
    }
  }
  return { ok: true, value: changes };
}
