import { DEFAULT_ITEM_KIND, DELETE_SENTINEL, NO_UPDATE_TOKEN, UPDATE_TOKEN } from '../constants.js';
import type { EditableField } from '../types/jama.js';
import type { DescriptionBlock, DescriptionEntry, Row } from '../types/sheet.js';
import { describePreview, encodeDescriptionTable, renderDescriptionHtml } from './description-table.js';
import { fitPath } from './row-codec.js';

const SAMPLE_DESCRIPTION: DescriptionEntry[] = [
  { ioType: 'IN', category: 'trigger_action', dataName: 'Main switch', dataLabel: 'SW_MAIN', dataValue: 'ON' },
  { ioType: 'OUT', category: 'ego_vehicle_behavior', dataName: 'Steering assist', dataLabel: 'STR_ASSIST', dataValue: 'Active' },
  { ioType: 'OUT', category: 'hmi', dataName: 'Indicator', dataLabel: 'HMI_LKA', dataValue: 'Green' },
];

function sampleRow(values: Partial<Omit<Row, 'fields'>> & { fields?: Partial<Record<EditableField, string>> }): Row {
  const field = (name: EditableField): string => values.fields?.[name] ?? '';
  return {
    jamaId: values.jamaId ?? '',
    note: values.note ?? '',
    sequence: values.sequence ?? '',
    pathSegments: fitPath(values.pathSegments ?? []),
    itemType: values.itemType ?? DEFAULT_ITEM_KIND,
    fields: {
      assignee: field('assignee'),
      status: field('status'),
      tags: field('tags'),
      reason: field('reason'),
      preconditions: field('preconditions'),
      target_system: field('target_system'),
    },
    currentDescription: values.currentDescription ?? '',
    updateFlag: values.updateFlag ?? NO_UPDATE_TOKEN,
    descriptionRef: values.descriptionRef ?? '',
  };
}

/**
 * A small workbook showing each kind of row: skip, update, SYSP update,
 * delete and create.
 */
export function buildTemplate(): { rows: Row[]; descriptionBlocks: DescriptionBlock[] } {
  const root = 'Driver requirements';
  const syspHtml = renderDescriptionHtml(SAMPLE_DESCRIPTION);

  const rows = [
    sampleRow({ jamaId: '101', note: 'Left unchanged', sequence: '1', pathSegments: [root] }),
    sampleRow({
      jamaId: '102',
      sequence: '1.1',
      pathSegments: [root, 'Lane keeping'],
      fields: { status: 'Approved', tags: 'lane,assist' },
      updateFlag: UPDATE_TOKEN,
    }),
    sampleRow({
      jamaId: '103',
      sequence: '1.1.1',
      pathSegments: [root, 'Lane keeping', 'SYSP lane keeping assist'],
      itemType: 'SYSP',
      currentDescription: describePreview(syspHtml),
      updateFlag: UPDATE_TOKEN,
      descriptionRef: '#1',
    }),
    sampleRow({ jamaId: '104', note: DELETE_SENTINEL, sequence: '1.2', pathSegments: [root, 'Obsolete requirement'] }),
    sampleRow({
      sequence: '1.3',
      pathSegments: [root, 'New requirement'],
      fields: { assignee: 'Alice', status: 'Draft', target_system: 'ECU' },
    }),
  ];

  const descriptionBlocks: DescriptionBlock[] = [{
    ref: '#1',
    jamaId: '103',
    rowNumber: 4,
    table: encodeDescriptionTable(SAMPLE_DESCRIPTION).table,
    currentPreview: describePreview(syspHtml),
  }];

  return { rows, descriptionBlocks };
}
