import fs from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import type sharp from 'sharp';
import { OutputWriteError } from './errors';
import { pixelsToSharp } from './images';
import type { GrayImage, ProjectTableRow } from './types';

export const OUTPUT_FILES = {
  projectTable: 'projectTable.xlsx',
  montage: 'MontageFigure.png',
  fullImage: 'FullImageFigure.png',
  grayImage: 'GrayImageFigure.png',
  binaryImage: 'BWImageFigure.png',
  overlay: 'ImageWithCentroidsFigure.png',
} as const;

export type OutputName = keyof typeof OUTPUT_FILES;

export function outputPath(outDir: string, name: OutputName): string {
  return path.join(outDir, OUTPUT_FILES[name]);
}

export function ensureDirSync(dirPath: string) {
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (error) {
    throw new OutputWriteError(dirPath, error);
  }
}

const TABLE_COLUMNS: Array<{ header: string; key: keyof ProjectTableRow; width: number }> = [
  { header: 'id', key: 'id', width: 8 },
  { header: 'name', key: 'name', width: 40 },
  { header: 'publicationTitle', key: 'publicationTitle', width: 60 },
  { header: 'description', key: 'description', width: 80 },
];

/** Write the project table as a single-sheet workbook, replacing any existing file. */
export async function writeProjectTable(rows: ProjectTableRow[], filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet('projects');
  ws.columns = TABLE_COLUMNS;

  const header = ws.getRow(1);
  header.font = { bold: true };
  header.alignment = { vertical: 'middle' };

  for (const row of rows) {
    ws.addRow(row);
  }

  try {
    await workbook.xlsx.writeFile(filePath);
  } catch (error) {
    throw new OutputWriteError(filePath, error);
  }
}

/** Encode `pipeline` as PNG, whatever the extension of `filePath`. */
export async function writeFigure(pipeline: sharp.Sharp, filePath: string): Promise<void> {
  try {
    await pipeline.png().toFile(filePath);
  } catch (error) {
    throw new OutputWriteError(filePath, error);
  }
}

export async function writeGrayFigure(image: GrayImage, filePath: string): Promise<void> {
  await writeFigure(pixelsToSharp(image), filePath);
}
