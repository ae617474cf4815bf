import type { ActionRecord, UpdateResult } from '../types/sync.js';

/**
 * One line per planned action, e.g. `Row 4: update ID=102 "Lane keeping" [status]`
 */
export function describeRecord(record: ActionRecord): string {
  const { item, rowNumber } = record.row;
  const target = item.id !== undefined ? `ID=${item.id}` : 'new';
  const fields = record.changedFields.length > 0 ? ` [${record.changedFields.join(', ')}]` : '';
  return `Row ${rowNumber}: ${record.action} ${target} "${item.name}"${fields}`;
}

export function summaryLines(result: UpdateResult): string[] {
  const lines = [
    result.dryRun ? '--- Dry Run Plan ---' : '--- Update Results ---',
    `Create:    ${result.counts.create}`,
    `Update:    ${result.counts.update}`,
    `Delete:    ${result.counts.delete}`,
    `Skip:      ${result.counts.skip}`,
  ];
  if (!result.dryRun) {
    lines.push(
      `Succeeded: ${result.succeeded}`,
      `Failed:    ${result.failed}`,
      `Skipped:   ${result.skipped}`,
    );
    if (result.alreadyDeleted > 0) lines.push(`Already deleted: ${result.alreadyDeleted}`);
  }
  return lines;
}
