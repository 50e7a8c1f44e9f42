import { SheetRow, SheetRowSchema } from '../schemas';
import { parseCsvRecords } from '../utils/csv';
import { debugLogger } from '../utils/debug-logger';

/**
 * Curated rows maintained outside the service (a published spreadsheet)
 */
export interface SheetSource {
  fetchRows(): Promise<SheetRow[]>;
}

export function sheetCsvUrl(sheetId: string, gid = '0'): string {
  return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(sheetId)}/export?format=csv&gid=${encodeURIComponent(gid)}`;
}

export function parseSheetCsv(text: string): SheetRow[] {
  return parseCsvRecords(text).map(record => SheetRowSchema.parse(record));
}

export interface CsvSheetSourceOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Reads the sheet through its CSV export. Any failure yields no rows.
 */
export class CsvSheetSource implements SheetSource {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly csvUrl: string,
    options: CsvSheetSourceOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 12000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchRows(): Promise<SheetRow[]> {
    const stepId = debugLogger.stepStart('SHEET', 'Fetching sheet rows', { url: this.csvUrl });
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.csvUrl, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      const rows = parseSheetCsv(await response.text());
      debugLogger.stepFinish(stepId, { rowCount: rows.length });
      return rows;
    } catch (error) {
      debugLogger.stepError(stepId, 'SHEET', 'Sheet fetch failed', error);
      console.error('Sheet fetch error:', error instanceof Error ? error.message : error);
      return [];
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Used when no sheet is configured
 */
export class EmptySheetSource implements SheetSource {
  async fetchRows(): Promise<SheetRow[]> {
    return [];
  }
}
