import type { DescriptionCategory } from './types/sheet.js';

// Canonical editable fields, in column order
export const EDITABLE_FIELDS = [
  'assignee',
  'status',
  'tags',
  'reason',
  'preconditions',
  'target_system',
] as const;

// Every field name the remote store is matched against
export const CANONICAL_FIELDS = [...EDITABLE_FIELDS, 'description'] as const;

// Number of hierarchy-level name columns in the requirement sheet
export const MAX_HIERARCHY_DEPTH = 11;

// Note value that marks a row for deletion (exact match only)
export const DELETE_SENTINEL = '削除';

// Update-flag cell tokens
export const UPDATE_TOKEN = 'する';
export const NO_UPDATE_TOKEN = 'しない';

// Item kind that carries a structured description table
export const SYSP_MARKER = 'SYSP';
export const DEFAULT_ITEM_KIND = 'Requirement';

// Sheet names
export const REQUIREMENT_SHEET = 'Requirement list';
export const DESCRIPTION_SHEET = 'Description edit';

// Requirement sheet headers, A..X
export const REQUIREMENT_HEADERS = [
  'JAMA_ID',
  'Note',
  'Sequence',
  ...Array.from({ length: MAX_HIERARCHY_DEPTH }, (_, i) => `Level ${i + 1}`),
  'Item Type',
  'Assignee',
  'Status',
  'Tags',
  'Reason',
  'Preconditions',
  'Target_system',
  'Current Description',
  'Update',
  'Description Ref',
];

// Description table: column partition of the 80 data columns
export const DESCRIPTION_LAYOUT: ReadonlyArray<{
  category: DescriptionCategory;
  label: string;
  ioType: 'IN' | 'OUT';
  slots: number;
}> = [
  { category: 'trigger_action', label: '(a)Trigger action', ioType: 'IN', slots: 1 },
  { category: 'ego_vehicle_behavior', label: '(b)Behavior of ego-vehicle', ioType: 'OUT', slots: 64 },
  { category: 'hmi', label: '(c)HMI', ioType: 'OUT', slots: 10 },
  { category: 'other', label: '(d)Other', ioType: 'OUT', slots: 5 },
];

// Row labels of the 5-row description table
export const DESCRIPTION_ROW_LABELS = ['I/O Type', '', 'Data Name', 'Data Label', 'Data'] as const;

export const DESCRIPTION_DATA_COLUMNS = DESCRIPTION_LAYOUT.reduce((sum, c) => sum + c.slots, 0);
export const DESCRIPTION_TABLE_WIDTH = DESCRIPTION_DATA_COLUMNS + 1;

// Page size for the remote item listing
export const PAGE_SIZE = 50;

// Number of fetched items whose raw field keys are dumped in debug mode
export const DEBUG_FIELD_DUMP_LIMIT = 5;

// Items fetched by --sample-mode when no --sample-count is given
export const DEFAULT_SAMPLE_COUNT = 100;

// Max retry attempts for API calls
export const MAX_RETRIES = 3;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 1000;

// Per-request timeout (ms)
export const REQUEST_TIMEOUT_MS = 30_000;

// Refresh OAuth tokens this long before they expire (ms)
export const TOKEN_EXPIRY_MARGIN_MS = 60_000;

// Column widths are fitted against at most this many rows by default
export const DEFAULT_COLUMN_WIDTH_CHECK_ROWS = 100;
export const MAX_COLUMN_WIDTH = 50;

// Default config / log file names
export const DEFAULT_CONFIG_FILE = 'config.json';
export const LOG_FILE = 'jamasync.log';
