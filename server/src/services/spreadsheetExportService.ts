import path from 'path';
import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import { SpreadsheetExportError } from '../errors';
import type { EstimateSection } from '../types';

/** First row that receives takeoff data */
export const FIRST_DATA_ROW = 4;
export const SHEET_NAME = 'Estimate';
export const LABOR_LABEL = 'Labor';

const roundToHundredths = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * Same directory and base name as the document, with an .xlsx extension
 */
export function spreadsheetPathFor(documentPath: string): string {
  const parsed = path.parse(documentPath);
  return path.join(parsed.dir, `${parsed.name}.xlsx`);
}

/**
 * One (name, count) row per takeoff, a blank row between categories and a
 * closing Labor row.
 */
export function buildEstimateWorkbook(sections: readonly EstimateSection[], totalLabor: number): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(SHEET_NAME);
  worksheet.getColumn(1).width = 32;
  worksheet.getColumn(2).width = 12;

  let row = FIRST_DATA_ROW;
  sections.forEach((section, index) => {
    for (const item of section.rows) {
      worksheet.getCell(row, 1).value = item.name;
      worksheet.getCell(row, 2).value = item.count;
      row++;
    }
    if (index < sections.length - 1) {
      row++;
    }
  });

  worksheet.getCell(row, 1).value = LABOR_LABEL;
  worksheet.getCell(row, 2).value = roundToHundredths(totalLabor);
  worksheet.getCell(row, 1).font = { bold: true };

  return workbook;
}

/**
 * Write the estimate workbook next to the destination and move it into place
 */
export async function exportEstimateSpreadsheet(
  sections: readonly EstimateSection[],
  totalLabor: number,
  destinationPath: string
): Promise<string> {
  const tempPath = `${destinationPath}.${process.pid}.tmp`;
  try {
    const workbook = buildEstimateWorkbook(sections, totalLabor);
    await workbook.xlsx.writeFile(tempPath);
    await fs.move(tempPath, destinationPath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    console.error('❌ EXPORT_SPREADSHEET:', error);
    throw new SpreadsheetExportError(destinationPath, error);
  }

  console.log(`✅ EXPORT_SPREADSHEET: ${destinationPath}`);
  return destinationPath;
}
