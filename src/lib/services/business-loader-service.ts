import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataLoadError, getErrorMessage } from '../utils/errors';
import { businessRecordSchema } from '../schemas/pipeline-schemas';
import type { BusinessRecord } from '../types/business';

const rowsSchema = z.array(z.unknown());

/**
 * Loads business lists exported from directories or spreadsheets.
 *
 * CSV headers: name,address,phone,website
 * JSON: an array of objects with the same keys
 */
export class BusinessLoaderService {
  /**
   * Standardized file name for a city's business list
   */
  cityFileName(city: string, state: string, extension: 'csv' | 'json' = 'csv'): string {
    const slug = (value: string) => value.trim().toLowerCase().replace(/\s+/g, '_');
    return `${slug(city)}_${slug(state)}.${extension}`;
  }

  async loadBusinesses(filePath: string): Promise<BusinessRecord[]> {
    if (!fs.existsSync(filePath)) {
      throw new DataLoadError(`Business file not found: ${filePath}`, { filePath });
    }

    const content = await fs.promises.readFile(filePath, 'utf-8');
    const extension = path.extname(filePath).toLowerCase();

    let rows: unknown[];
    try {
      rows = extension === '.json' ? this.parseJson(content) : this.parseCsv(content);
    } catch (error) {
      throw new DataLoadError(`Could not parse ${filePath}: ${getErrorMessage(error)}`, { filePath });
    }

    return this.toRecords(rows, filePath);
  }

  parseCsv(content: string): unknown[] {
    const records: unknown = parse(content, {
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
    return rowsSchema.parse(records);
  }

  parseJson(content: string): unknown[] {
    const parsed = rowsSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error('Expected a JSON array of businesses');
    }
    return parsed.data;
  }

  toRecords(rows: unknown[], source = 'input'): BusinessRecord[] {
    const businesses: BusinessRecord[] = [];

    rows.forEach((row, index) => {
      const parsed = businessRecordSchema.safeParse(row);
      if (!parsed.success) {
        console.warn(
          `[BusinessLoader] Skipping row ${index + 1} of ${source}: ${parsed.error.issues
            .map((issue) => issue.message)
            .join(', ')}`
        );
        return;
      }
      businesses.push(parsed.data);
    });

    console.log(`[BusinessLoader] Loaded ${businesses.length} businesses from ${source}`);
    return businesses;
  }
}

export const businessLoaderService = new BusinessLoaderService();
