import {
  EDITABLE_FIELDS,
  MAX_HIERARCHY_DEPTH,
  NO_UPDATE_TOKEN,
  REQUIREMENT_HEADERS,
  SYSP_MARKER,
  UPDATE_TOKEN,
} from '../constants.js';
import type { CanonicalField, EditableField, ItemKind, RemoteItem } from '../types/jama.js';
import type { DecodedRow, DescriptionTable, Row } from '../types/sheet.js';
import { decodeDescriptionTable, describePreview, renderDescriptionHtml } from './description-table.js';
import { FormatError } from '../utils/errors.js';

function editableFields(valueOf: (field: EditableField) => string): Record<EditableField, string> {
  return {
    assignee: valueOf('assignee'),
    status: valueOf('status'),
    tags: valueOf('tags'),
    reason: valueOf('reason'),
    preconditions: valueOf('preconditions'),
    target_system: valueOf('target_system'),
  };
}

export function isSyspName(name: string): boolean {
  return name.includes(SYSP_MARKER);
}

export function itemKindOf(name: string, itemType?: string): ItemKind {
  return itemType === SYSP_MARKER || isSyspName(name) ? 'SYSP' : 'Requirement';
}

/**
 * Fit a hierarchy path into the fixed level columns. Paths deeper than the
 * column count keep their leading ancestors and the item's own name.
 */
export function fitPath(segments: string[]): string[] {
  const fitted = segments.length > MAX_HIERARCHY_DEPTH
    ? [...segments.slice(0, MAX_HIERARCHY_DEPTH - 1), segments[segments.length - 1]]
    : [...segments];
  while (fitted.length < MAX_HIERARCHY_DEPTH) fitted.push('');
  return fitted;
}

/**
 * Build the sheet row for a remote item placed under `ancestorPath`.
 */
export function encodeRow(
  item: RemoteItem,
  ancestorPath: string[],
  options: { descriptionRef?: string } = {},
): Row {
  return {
    jamaId: item.id !== undefined ? String(item.id) : '',
    note: '',
    sequence: item.sequence,
    pathSegments: fitPath([...ancestorPath, item.name]),
    itemType: item.itemType,
    fields: editableFields(field => item.fields[field] ?? ''),
    currentDescription: describePreview(item.fields.description ?? ''),
    updateFlag: NO_UPDATE_TOKEN,
    descriptionRef: options.descriptionRef ?? '',
  };
}

function parseJamaId(value: string, rowNumber: number): number | undefined {
  const text = value.trim();
  if (text === '') return undefined;
  if (!/^\d+$/.test(text) || Number(text) === 0) {
    throw new FormatError(`Row ${rowNumber}: JAMA_ID "${text}" is not a positive integer`);
  }
  return Number(text);
}

/**
 * Read a sheet row back into an item. Blank editable cells are left out of
 * `fields` so they never overwrite remote values.
 */
export function decodeRow(
  row: Row,
  rowNumber: number,
  descriptionTables: ReadonlyMap<string, DescriptionTable> = new Map(),
): DecodedRow {
  const pathSegments = [...row.pathSegments];
  while (pathSegments.length > 0 && pathSegments[pathSegments.length - 1] === '') {
    pathSegments.pop();
  }
  const name = pathSegments[pathSegments.length - 1] ?? '';

  const fields: Partial<Record<CanonicalField, string>> = {};
  for (const field of EDITABLE_FIELDS) {
    const value = row.fields[field];
    if (value.trim() !== '') fields[field] = value;
  }

  const table = row.descriptionRef ? descriptionTables.get(row.descriptionRef) : undefined;
  if (table) {
    const entries = decodeDescriptionTable(table);
    if (entries.length > 0) fields.description = renderDescriptionHtml(entries);
  }

  return {
    rowNumber,
    item: {
      id: parseJamaId(row.jamaId, rowNumber),
      itemType: itemKindOf(name, row.itemType),
      name,
      sequence: row.sequence.trim(),
      pathSegments,
      fields,
    },
    note: row.note,
    updateFlag: row.updateFlag.trim() === UPDATE_TOKEN,
  };
}

/**
 * Cells in sheet column order (A..X)
 */
export function rowToCells(row: Row): string[] {
  return [
    row.jamaId,
    row.note,
    row.sequence,
    ...fitPath(row.pathSegments),
    row.itemType,
    ...EDITABLE_FIELDS.map(field => row.fields[field]),
    row.currentDescription,
    row.updateFlag,
    row.descriptionRef,
  ];
}

export function rowFromCells(cells: string[]): Row {
  const cell = (index: number): string => cells[index] ?? '';
  const levelStart = 3;
  const typeColumn = levelStart + MAX_HIERARCHY_DEPTH;
  const fieldStart = typeColumn + 1;

  const fields = editableFields(field => cell(fieldStart + EDITABLE_FIELDS.indexOf(field)));
  const afterFields = fieldStart + EDITABLE_FIELDS.length;

  return {
    jamaId: cell(0),
    note: cell(1),
    sequence: cell(2),
    pathSegments: Array.from({ length: MAX_HIERARCHY_DEPTH }, (_, i) => cell(levelStart + i)),
    itemType: cell(typeColumn),
    fields,
    currentDescription: cell(afterFields),
    updateFlag: cell(afterFields + 1),
    descriptionRef: cell(afterFields + 2),
  };
}

export const REQUIREMENT_COLUMN_COUNT = REQUIREMENT_HEADERS.length;
