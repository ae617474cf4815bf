import { existsSync } from 'node:fs';
import ExcelJS from 'exceljs';
import type { Borders, Cell, Fill, Font, Worksheet } from 'exceljs';
import {
  DEFAULT_COLUMN_WIDTH_CHECK_ROWS,
  DESCRIPTION_ROW_LABELS,
  DESCRIPTION_SHEET,
  DESCRIPTION_TABLE_WIDTH,
  MAX_COLUMN_WIDTH,
  NO_UPDATE_TOKEN,
  REQUIREMENT_HEADERS,
  REQUIREMENT_SHEET,
  UPDATE_TOKEN,
} from '../constants.js';
import type { DescriptionBlock, DescriptionTable, NumberedRow, Row } from '../types/sheet.js';
import { emptyDescriptionTable, rowSegments } from './description-table.js';
import { REQUIREMENT_COLUMN_COUNT, rowFromCells, rowToCells } from './row-codec.js';
import { FormatError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// Block layout on the description sheet: header, 5 table rows, preview label, preview, spacer
const BLOCK_HEIGHT = 9;
const FIRST_BLOCK_ROW = 2;
const BLOCK_HEADER = /^=+ \[(#\d+)\] JAMA_ID: (.*?) =+$/;
const DATA_ROWS = [2, 3, 4];

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9E2F3' } };
const INPUT_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFF2CC' } };
const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};
const LINK_FONT: Partial<Font> = { color: { argb: 'FF0000FF' }, underline: 'single' };

const UPDATE_COLUMN = REQUIREMENT_HEADERS.indexOf('Update') + 1;
const REF_COLUMN = REQUIREMENT_HEADERS.indexOf('Description Ref') + 1;
const JAMA_ID_COLUMN = 1;
// column of the back-link on a block header row
const BACK_LINK_COLUMN = 11;

export interface WorkbookContents {
  rows: NumberedRow[];
  descriptionTables: Map<string, DescriptionTable>;
}

export interface WriteWorkbookOptions {
  columnWidthCheckRows?: number;
}

export function blockHeader(ref: string, jamaId: string): string {
  return `========== [${ref}] JAMA_ID: ${jamaId || 'new'} ==========`;
}

function internalLink(sheet: string, row: number): string {
  return `#'${sheet}'!A${row}`;
}

function blockStartRow(index: number): number {
  return FIRST_BLOCK_ROW + index * BLOCK_HEIGHT;
}

function writeRequirementSheet(sheet: Worksheet, rows: Row[], blockRows: Map<string, number>): void {
  const header = sheet.addRow([...REQUIREMENT_HEADERS]);
  header.eachCell(cell => {
    cell.font = { bold: true };
    cell.fill = HEADER_FILL;
    cell.border = THIN_BORDER;
  });
  sheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];

  for (const row of rows) {
    const cells = rowToCells(row).map(value => (value === '' ? null : value));
    const added = sheet.addRow(cells);

    if (/^\d+$/.test(row.jamaId)) {
      added.getCell(JAMA_ID_COLUMN).value = Number(row.jamaId);
    }
    added.getCell(UPDATE_COLUMN).dataValidation = {
      type: 'list',
      allowBlank: true,
      formulae: [`"${UPDATE_TOKEN},${NO_UPDATE_TOKEN}"`],
    };

    const blockRow = row.descriptionRef ? blockRows.get(row.descriptionRef) : undefined;
    if (blockRow !== undefined) {
      const ref = added.getCell(REF_COLUMN);
      ref.value = { text: row.descriptionRef, hyperlink: internalLink(DESCRIPTION_SHEET, blockRow) };
      ref.font = LINK_FONT;
    }
  }
}

function styleTableCell(cell: Cell, tableRow: number, tableColumn: number): void {
  cell.border = THIN_BORDER;
  if (tableColumn === 0 || tableRow < DATA_ROWS[0]) {
    cell.fill = HEADER_FILL;
  } else {
    cell.fill = INPUT_FILL;
  }
}

function writeDescriptionBlock(sheet: Worksheet, block: DescriptionBlock, headerRow: number): void {
  const header = sheet.getCell(headerRow, 1);
  header.value = blockHeader(block.ref, block.jamaId);
  header.font = { bold: true };
  sheet.mergeCells(headerRow, 1, headerRow, BACK_LINK_COLUMN - 1);

  const back = sheet.getCell(headerRow, BACK_LINK_COLUMN);
  back.value = { text: 'Back to list', hyperlink: internalLink(REQUIREMENT_SHEET, block.rowNumber) };
  back.font = LINK_FONT;

  for (let tableRow = 0; tableRow < DESCRIPTION_ROW_LABELS.length; tableRow++) {
    const sheetRow = headerRow + 1 + tableRow;
    for (let column = 0; column < DESCRIPTION_TABLE_WIDTH; column++) {
      const cell = sheet.getCell(sheetRow, column + 1);
      const value = block.table.cells[tableRow]?.[column] ?? '';
      if (value !== '') cell.value = value;
      styleTableCell(cell, tableRow, column);
    }
    if (tableRow < DATA_ROWS[0]) {
      for (const [start, width] of rowSegments(tableRow)) {
        if (width > 1) sheet.mergeCells(sheetRow, start + 1, sheetRow, start + width);
      }
    }
  }

  const previewRow = headerRow + 1 + DESCRIPTION_ROW_LABELS.length;
  sheet.getCell(previewRow, 1).value = 'Current description:';
  if (block.currentPreview) {
    const preview = sheet.getCell(previewRow + 1, 1);
    preview.value = block.currentPreview;
    preview.alignment = { wrapText: true, vertical: 'top' };
    sheet.mergeCells(previewRow + 1, 1, previewRow + 1, 26);
  }
}

function fitColumnWidths(sheet: Worksheet, checkRows: number): void {
  const lastRow = Math.min(sheet.rowCount, checkRows + 1);
  for (let column = 1; column <= REQUIREMENT_COLUMN_COUNT; column++) {
    let longest = 0;
    for (let row = 1; row <= lastRow; row++) {
      for (const line of sheet.getRow(row).getCell(column).text.split('\n')) {
        longest = Math.max(longest, line.length);
      }
    }
    sheet.getColumn(column).width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
  }
}

/**
 * Write the requirement sheet and the description sheet, one linked block
 * per SYSP row.
 */
export async function writeWorkbook(
  path: string,
  content: { rows: Row[]; descriptionBlocks: DescriptionBlock[] },
  options: WriteWorkbookOptions = {},
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const blockRows = new Map<string, number>();
  content.descriptionBlocks.forEach((block, index) => blockRows.set(block.ref, blockStartRow(index)));

  const requirements = workbook.addWorksheet(REQUIREMENT_SHEET);
  writeRequirementSheet(requirements, content.rows, blockRows);
  fitColumnWidths(requirements, options.columnWidthCheckRows ?? DEFAULT_COLUMN_WIDTH_CHECK_ROWS);

  const descriptions = workbook.addWorksheet(DESCRIPTION_SHEET);
  descriptions.getColumn(1).width = 14;
  content.descriptionBlocks.forEach((block, index) => {
    writeDescriptionBlock(descriptions, block, blockStartRow(index));
  });

  try {
    await workbook.xlsx.writeFile(path);
  } catch (err) {
    throw new Error(`Failed to write ${path}: ${errorMessage(err)}`, { cause: err });
  }
  logger.debug(`Wrote ${content.rows.length} rows and ${content.descriptionBlocks.length} description blocks`);
}

function checkHeaders(sheet: Worksheet): void {
  const headerRow = sheet.getRow(1);
  const problems: string[] = [];
  REQUIREMENT_HEADERS.forEach((expected, index) => {
    const actual = headerRow.getCell(index + 1).text.trim();
    if (actual !== expected) {
      problems.push(`Column ${index + 1}: expected "${expected}", found "${actual}"`);
    }
  });
  if (problems.length > 0) {
    throw new FormatError(`Sheet "${REQUIREMENT_SHEET}" does not have the expected header row`, problems);
  }
}

function readRequirementRows(sheet: Worksheet): NumberedRow[] {
  const rows: NumberedRow[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const sheetRow = sheet.getRow(rowNumber);
    const cells = Array.from({ length: REQUIREMENT_COLUMN_COUNT }, (_, i) => sheetRow.getCell(i + 1).text);
    if (cells.every(cell => cell.trim() === '')) continue;
    rows.push({ rowNumber, row: rowFromCells(cells) });
  }
  return rows;
}

function readDescriptionTables(sheet: Worksheet): Map<string, DescriptionTable> {
  const tables = new Map<string, DescriptionTable>();
  for (let rowNumber = 1; rowNumber <= sheet.rowCount; rowNumber++) {
    const match = BLOCK_HEADER.exec(sheet.getRow(rowNumber).getCell(1).text.trim());
    if (!match) continue;

    const table = emptyDescriptionTable();
    for (const tableRow of DATA_ROWS) {
      const sheetRow = sheet.getRow(rowNumber + 1 + tableRow);
      for (let column = 1; column < DESCRIPTION_TABLE_WIDTH; column++) {
        table.cells[tableRow][column] = sheetRow.getCell(column + 1).text.trim();
      }
    }
    tables.set(match[1], table);
  }
  return tables;
}

/**
 * Read an edited workbook. The description sheet is optional.
 */
export async function readWorkbook(path: string): Promise<WorkbookContents> {
  if (!existsSync(path)) {
    throw new FormatError(`Workbook not found: ${path}`);
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(path);
  } catch (err) {
    throw new FormatError(`Failed to read workbook ${path}: ${errorMessage(err)}`, [], { cause: err });
  }

  const requirements = workbook.getWorksheet(REQUIREMENT_SHEET);
  if (!requirements) {
    throw new FormatError(`Sheet "${REQUIREMENT_SHEET}" not found in ${path}`);
  }
  checkHeaders(requirements);

  const descriptions = workbook.getWorksheet(DESCRIPTION_SHEET);
  const descriptionTables = descriptions ? readDescriptionTables(descriptions) : new Map<string, DescriptionTable>();
  const rows = readRequirementRows(requirements);
  logger.debug(`Read ${rows.length} rows and ${descriptionTables.size} description tables from ${path}`);

  return { rows, descriptionTables };
}
