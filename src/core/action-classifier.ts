import { CANONICAL_FIELDS, DELETE_SENTINEL } from '../constants.js';
import type { CanonicalField } from '../types/jama.js';
import type { DecodedRow } from '../types/sheet.js';
import type { ActionRecord } from '../types/sync.js';

/**
 * Fields a create or update would send, in column order
 */
function populatedFields(row: DecodedRow): CanonicalField[] {
  return CANONICAL_FIELDS.filter(field => {
    const value = row.item.fields[field];
    return value !== undefined && value !== '';
  });
}

/**
 * Decide what to do with one row. First match wins:
 *
 * | JAMA_ID | note           | update flag | action |
 * |---------|----------------|-------------|--------|
 * | empty   | any            | any         | create |
 * | present | exactly 削除    | any         | delete |
 * | present | anything else  | set         | update |
 * | present | anything else  | not set     | skip   |
 *
 * The note is compared by exact equality; "削除予定" is not a delete.
 */
export function classifyRow(row: DecodedRow): ActionRecord {
  if (row.item.id === undefined) {
    return { row, action: 'create', changedFields: populatedFields(row) };
  }
  if (row.note === DELETE_SENTINEL) {
    return { row, action: 'delete', changedFields: [] };
  }
  if (row.updateFlag) {
    return { row, action: 'update', changedFields: populatedFields(row) };
  }
  return { row, action: 'skip', changedFields: [] };
}
