/**
 * File management utilities
 */
import { mkdir, writeFile, readFile, readdir, access } from 'fs/promises';
import { dirname, join } from 'path';
import { constants } from 'fs';
import { logger } from './logger.js';

export class FileManager {
  /**
   * Ensure a directory exists, creating it if necessary
   */
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await access(dirPath, constants.F_OK);
    } catch {
      await mkdir(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
  }

  /**
   * Write JSON data to a file
   */
  static async writeJSON(filePath: string, data: unknown): Promise<void> {
    try {
      await this.ensureDir(dirname(filePath));
      await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
      logger.debug(`Wrote JSON to: ${filePath}`);
    } catch (error) {
      logger.error(`Failed to write JSON to ${filePath}:`, error);
      throw error;
    }
  }

  /**
   * Read JSON data from a file
   */
  static async readJSON(filePath: string): Promise<unknown> {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content);
  }

  /**
   * List the CSV files of a directory in file name order.
   * Plain code-unit comparison keeps the order identical across locales.
   */
  static async listCsvFiles(dirPath: string): Promise<string[]> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
      .map((entry) => entry.name)
      .sort(compareText)
      .map((name) => join(dirPath, name));
  }
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
