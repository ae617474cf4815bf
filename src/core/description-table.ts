import { Parser } from 'htmlparser2';
import {
  DESCRIPTION_LAYOUT,
  DESCRIPTION_ROW_LABELS,
  DESCRIPTION_TABLE_WIDTH,
} from '../constants.js';
import type { DescriptionCategory, DescriptionEntry, DescriptionTable } from '../types/sheet.js';

const IO_ROW = 0;
const CATEGORY_ROW = 1;
const NAME_ROW = 2;
const LABEL_ROW = 3;
const VALUE_ROW = 4;

interface CategorySpan {
  category: DescriptionCategory;
  label: string;
  ioType: 'IN' | 'OUT';
  slots: number;
  start: number;
}

// Column 0 holds the row labels, so data columns start at 1
const SPANS: CategorySpan[] = DESCRIPTION_LAYOUT.reduce<CategorySpan[]>((spans, layout) => {
  const previous = spans[spans.length - 1];
  const start = previous ? previous.start + previous.slots : 1;
  spans.push({ ...layout, start });
  return spans;
}, []);

export function categorySpan(category: DescriptionCategory): CategorySpan {
  const span = SPANS.find(s => s.category === category);
  if (!span) throw new Error(`Unknown description category: ${category}`);
  return span;
}

/**
 * Table column of the `ordinal`-th slot of a category
 */
export function slotColumn(category: DescriptionCategory, ordinal: number): number {
  const span = categorySpan(category);
  if (ordinal < 0 || ordinal >= span.slots) {
    throw new RangeError(`${category} has ${span.slots} slots, got ordinal ${ordinal}`);
  }
  return span.start + ordinal;
}

export function emptyDescriptionTable(): DescriptionTable {
  const cells = DESCRIPTION_ROW_LABELS.map(label => {
    const row = new Array<string>(DESCRIPTION_TABLE_WIDTH).fill('');
    row[0] = label;
    return row;
  });

  let previousIo: string | undefined;
  for (const span of SPANS) {
    // consecutive categories with the same I/O type share one merged cell
    if (span.ioType !== previousIo) cells[IO_ROW][span.start] = span.ioType;
    previousIo = span.ioType;
    cells[CATEGORY_ROW][span.start] = span.label;
  }
  return { cells };
}

/**
 * Place entries into their category's slots, in order. Entries past a
 * category's slot count are returned as overflow and left out of the table.
 * The table has one I/O type per category, so an entry whose `ioType`
 * differs from its category's is placed but reported as mismatched; it
 * decodes with the category's I/O type.
 */
export function encodeDescriptionTable(entries: DescriptionEntry[]): {
  table: DescriptionTable;
  overflow: DescriptionEntry[];
  mismatched: DescriptionEntry[];
} {
  const table = emptyDescriptionTable();
  const overflow: DescriptionEntry[] = [];
  const mismatched: DescriptionEntry[] = [];
  const used = new Map<DescriptionCategory, number>();

  for (const entry of entries) {
    const ordinal = used.get(entry.category) ?? 0;
    const span = categorySpan(entry.category);
    if (ordinal >= span.slots) {
      overflow.push(entry);
      continue;
    }
    if (entry.ioType !== span.ioType) mismatched.push(entry);
    const column = span.start + ordinal;
    table.cells[NAME_ROW][column] = entry.dataName;
    table.cells[LABEL_ROW][column] = entry.dataLabel;
    table.cells[VALUE_ROW][column] = entry.dataValue;
    used.set(entry.category, ordinal + 1);
  }

  return { table, overflow, mismatched };
}

function cellAt(table: DescriptionTable, row: number, column: number): string {
  return table.cells[row]?.[column] ?? '';
}

/**
 * Read entries back left to right, category by category. Columns without a
 * data value are absent.
 */
export function decodeDescriptionTable(table: DescriptionTable): DescriptionEntry[] {
  const entries: DescriptionEntry[] = [];
  for (const span of SPANS) {
    for (let ordinal = 0; ordinal < span.slots; ordinal++) {
      const column = span.start + ordinal;
      const dataValue = cellAt(table, VALUE_ROW, column);
      if (dataValue.trim() === '') continue;
      entries.push({
        ioType: span.ioType,
        category: span.category,
        dataName: cellAt(table, NAME_ROW, column),
        dataLabel: cellAt(table, LABEL_ROW, column),
        dataValue,
      });
    }
  }
  return entries;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Merged cells of one table row as [start column, width] pairs
 */
export function rowSegments(row: number): Array<[number, number]> {
  if (row === IO_ROW) {
    const runs: Array<[number, number]> = [[0, 1]];
    let previousIo: string | undefined;
    for (const span of SPANS) {
      const last = runs[runs.length - 1];
      if (span.ioType === previousIo) {
        last[1] += span.slots;
      } else {
        runs.push([span.start, span.slots]);
      }
      previousIo = span.ioType;
    }
    return runs;
  }
  if (row === CATEGORY_ROW) {
    return [[0, 1], ...SPANS.map((span): [number, number] => [span.start, span.slots])];
  }
  return Array.from({ length: DESCRIPTION_TABLE_WIDTH }, (_, column): [number, number] => [column, 1]);
}

/**
 * Serialize a table as the HTML the remote description field stores.
 */
export function tableToHtml(table: DescriptionTable): string {
  const lines = ['<table border="1">'];
  for (let row = 0; row < DESCRIPTION_ROW_LABELS.length; row++) {
    const cells = rowSegments(row).map(([start, width]) => {
      const span = width > 1 ? ` colspan="${width}"` : '';
      return `<td${span}>${escapeHtml(cellAt(table, row, start))}</td>`;
    });
    lines.push(`<tr>${cells.join('')}</tr>`);
  }
  lines.push('</table>');
  return lines.join('\n');
}

export function renderDescriptionHtml(entries: DescriptionEntry[]): string {
  return tableToHtml(encodeDescriptionTable(entries).table);
}

interface ParsedHtml {
  tables: string[][][];
  text: string;
}

/**
 * Collect every table (colspans expanded into empty cells) and the plain text
 */
export function parseHtml(html: string): ParsedHtml {
  const tables: string[][][] = [];
  const textParts: string[] = [];
  let table: string[][] | undefined;
  let row: string[] | undefined;
  let cell: string | undefined;
  let colspan = 1;

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name === 'table') {
          table = [];
        } else if (name === 'tr' && table) {
          row = [];
        } else if ((name === 'td' || name === 'th') && row) {
          cell = '';
          const span = Number.parseInt(attribs.colspan ?? '1', 10);
          colspan = Number.isFinite(span) && span > 1 ? span : 1;
        } else if (name === 'br' && cell !== undefined) {
          cell += '\n';
        }
      },
      ontext(text) {
        textParts.push(text);
        if (cell !== undefined) cell += text;
      },
      onclosetag(name) {
        if ((name === 'td' || name === 'th') && row && cell !== undefined) {
          row.push(cell.trim());
          for (let i = 1; i < colspan; i++) row.push('');
          cell = undefined;
        } else if (name === 'tr' && table && row) {
          if (row.length > 0) table.push(row);
          row = undefined;
        } else if (name === 'table' && table) {
          if (table.length > 0) tables.push(table);
          table = undefined;
        }
      },
    },
    { decodeEntities: true },
  );
  parser.write(html);
  parser.end();

  return { tables, text: textParts.join('').replace(/\s+/g, ' ').trim() };
}

function spanOfLabel(label: string): CategorySpan | undefined {
  const text = label.trim();
  if (!text) return undefined;
  // labels are matched on their "(a)".."(d)" prefix
  return SPANS.find(span => text === span.label || text.startsWith(span.label.slice(0, 3)));
}

/**
 * Read entries from a parsed source table, taking category boundaries and
 * I/O types from its own header rows. A category may span more columns than
 * it has slots.
 */
function decodeSourceTable(rows: string[][]): DescriptionEntry[] {
  const header = rows[CATEGORY_ROW];
  if (!header.some(label => spanOfLabel(label) !== undefined)) {
    return decodeDescriptionTable({ cells: rows });
  }

  const entries: DescriptionEntry[] = [];
  const width = Math.max(...rows.map(row => row.length));
  let current: CategorySpan | undefined;
  let io: 'IN' | 'OUT' | undefined;
  for (let column = 1; column < width; column++) {
    const label = header[column] ?? '';
    if (label.trim() !== '') current = spanOfLabel(label);
    const ioText = (rows[IO_ROW][column] ?? '').trim();
    if (ioText === 'IN' || ioText === 'OUT') io = ioText;
    if (!current) continue;

    const dataValue = rows[VALUE_ROW][column] ?? '';
    if (dataValue.trim() === '') continue;
    entries.push({
      ioType: io ?? current.ioType,
      category: current.category,
      dataName: rows[NAME_ROW][column] ?? '',
      dataLabel: rows[LABEL_ROW][column] ?? '',
      dataValue,
    });
  }
  return entries;
}

/**
 * Parse a description field into entries. Returns undefined when the HTML
 * holds no table in the 5-row layout.
 */
export function parseDescriptionHtml(html: string): DescriptionEntry[] | undefined {
  if (!html) return undefined;
  const { tables } = parseHtml(html);
  const match = tables.find(t => t.length >= DESCRIPTION_ROW_LABELS.length
    && t[VALUE_ROW][0] === DESCRIPTION_ROW_LABELS[VALUE_ROW]);
  if (!match) return undefined;
  return decodeSourceTable(match.slice(0, DESCRIPTION_ROW_LABELS.length));
}

/**
 * Short read-only rendering of a description: the first rows of its first
 * table, or the leading text.
 */
export function describePreview(html: string): string {
  if (!html) return '';
  const { tables, text } = parseHtml(html);
  if (tables.length > 0) {
    return tables[0]
      .slice(0, 3)
      .map(row => row.slice(0, 4).join(' | '))
      .join('\n');
  }
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}
