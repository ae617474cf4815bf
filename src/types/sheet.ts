import type { EditableField, RemoteItem } from './jama.js';

/**
 * One line of the requirement sheet. Every cell is kept as text.
 */
export interface Row {
  jamaId: string;
  note: string;
  sequence: string;
  pathSegments: string[];
  itemType: string;
  fields: Record<EditableField, string>;
  currentDescription: string;
  updateFlag: string;
  descriptionRef: string;
}

export type DescriptionCategory = 'trigger_action' | 'ego_vehicle_behavior' | 'hmi' | 'other';

export interface DescriptionEntry {
  ioType: 'IN' | 'OUT';
  category: DescriptionCategory;
  dataName: string;
  dataLabel: string;
  dataValue: string;
}

/**
 * Fixed 5 x 81 grid: row 0 I/O type, row 1 category labels, rows 2-4 data
 * name / label / value. Column 0 holds the row labels.
 */
export interface DescriptionTable {
  cells: string[][];
}

/**
 * A description block read from (or written to) the description sheet
 */
export interface DescriptionBlock {
  ref: string;
  jamaId: string;
  rowNumber: number;
  table: DescriptionTable;
  currentPreview: string;
}

/**
 * A requirement row together with its 1-based sheet row number
 */
export interface NumberedRow {
  rowNumber: number;
  row: Row;
}

/**
 * A requirement row decoded for classification
 */
export interface DecodedRow {
  rowNumber: number;
  item: RemoteItem;
  note: string;
  updateFlag: boolean;
}
