import ExcelJS from 'exceljs';
import {
  ExportDocument,
  NOT_TESTED,
  PRIORITY_COLORS,
  STATUS_COLORS,
  StatusValues,
  TabularRow,
} from './export-types';
import { toTabularRows } from './tabular-rows';

export const SUMMARY_SHEET = 'Summary';
export const TEST_CASES_SHEET = 'Test Cases';

const MAX_COLUMN_WIDTH = 50;

const SOURCE_LABELS: Record<string, string> = {
  jira: 'Jira',
  azure: 'Azure DevOps',
  url: 'URL',
  text: 'Text',
};

const HEADER_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFEFE8DF' },
};

const HEADER_FONT: Partial<ExcelJS.Font> = {
  bold: true,
  size: 10,
  color: { argb: 'FF1F1B16' },
};

const BORDER_THIN: Partial<ExcelJS.Borders> = {
  top: { style: 'thin', color: { argb: 'FFD6CFC7' } },
  bottom: { style: 'thin', color: { argb: 'FFD6CFC7' } },
  left: { style: 'thin', color: { argb: 'FFD6CFC7' } },
  right: { style: 'thin', color: { argb: 'FFD6CFC7' } },
};

function applyColors(cell: ExcelJS.Cell, colors: { bg: string; text: string } | undefined): void {
  if (colors) {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF' + colors.bg } };
    cell.font = { ...cell.font, color: { argb: 'FF' + colors.text } };
  }
}

/**
 * Width of the longest line in a column, header included, capped at 50.
 */
export function columnWidth(column: string, rows: readonly TabularRow[]): number {
  const longest = rows.reduce((max, row) => {
    const lineLength = Math.max(...(row[column] ?? '').split('\n').map(line => line.length));
    return Math.max(max, lineLength);
  }, column.length);
  return Math.min(longest + 2, MAX_COLUMN_WIDTH);
}

export function countStatuses(rows: readonly TabularRow[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const status = row.Status || NOT_TESTED;
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  return counts;
}

export async function generateExcelReport(
  document: ExportDocument,
  statusOverrides: StatusValues = {}
): Promise<ExcelJS.Workbook> {
  const statusValues = { ...document.status, ...statusOverrides };
  const { columns, rows } = toTabularRows(document.test_data, statusValues);

  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'QA Test Case Studio';
  workbook.created = new Date();

  buildSummarySheet(workbook, document, rows);
  buildTestCasesSheet(workbook, columns, rows);

  return workbook;
}

function buildSummarySheet(workbook: ExcelJS.Workbook, document: ExportDocument, rows: TabularRow[]): void {
  const sheet = workbook.addWorksheet(SUMMARY_SHEET);
  const sourceLabel = SOURCE_LABELS[document.source_type] ?? document.source_type;

  const titleCell = sheet.getCell('A1');
  titleCell.value = `Test Cases Report - ${sourceLabel}`;
  titleCell.font = { bold: true, size: 16, color: { argb: 'FF1F1B16' } };

  sheet.getCell('A3').value = `Generated on: ${new Date().toISOString().slice(0, 19).replace('T', ' ')}`;
  sheet.getCell('A4').value = `Source Type: ${sourceLabel}`;
  sheet.getCell('A5').value = `Item IDs: ${document.item_ids.join(', ')}`;
  sheet.getCell('A6').value = `Total Test Cases: ${rows.length}`;

  const statusHeader = sheet.getCell('A8');
  statusHeader.value = 'Status Summary:';
  statusHeader.font = { bold: true };

  let row = 9;
  for (const [status, count] of countStatuses(rows)) {
    const cell = sheet.getCell(`A${row}`);
    cell.value = `${status}: ${count}`;
    applyColors(cell, STATUS_COLORS[status.toLowerCase()]);
    row++;
  }

  sheet.getColumn(1).width = 60;
}

function buildTestCasesSheet(workbook: ExcelJS.Workbook, columns: string[], rows: TabularRow[]): void {
  const sheet = workbook.addWorksheet(TEST_CASES_SHEET, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  columns.forEach((column, i) => {
    const cell = sheet.getCell(1, i + 1);
    cell.value = column;
    cell.font = HEADER_FONT;
    cell.fill = HEADER_FILL;
    cell.border = BORDER_THIN;
    cell.alignment = { vertical: 'middle', horizontal: 'left' };
    sheet.getColumn(i + 1).width = columnWidth(column, rows);
  });

  const priorityColumn = columns.indexOf('Priority') + 1;
  const statusColumn = columns.indexOf('Status') + 1;

  rows.forEach((values, idx) => {
    const rowNumber = idx + 2;

    columns.forEach((column, i) => {
      const cell = sheet.getCell(rowNumber, i + 1);
      cell.value = values[column] ?? '';
      cell.border = BORDER_THIN;
      cell.alignment = { vertical: 'top', horizontal: 'left', wrapText: true };
      cell.font = { size: 10 };
    });

    applyColors(sheet.getCell(rowNumber, priorityColumn), PRIORITY_COLORS[values.Priority.toLowerCase()]);
    applyColors(sheet.getCell(rowNumber, statusColumn), STATUS_COLORS[values.Status.toLowerCase()]);
  });
}
