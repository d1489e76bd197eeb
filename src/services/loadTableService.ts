import fs from 'fs';
import { LoadRecord, LOAD_RECORD_FIELDS } from '../types';
import {
  NotFoundError,
  ServiceUnavailableError,
  describeError,
} from '../middleware/errorHandler';
import { logError, logInfo, logWarn } from '../utils/logger';

export class LoadTableParseError extends Error {
  line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = 'LoadTableParseError';
    this.line = line;
  }
}

/**
 * Parse the loads file. The first line is a header and is skipped; every other
 * non-blank line is split on bare commas into the six LoadRecord columns.
 * Quoted fields are not supported, so a comma inside a value shifts the columns
 * of that row. Rows with fewer than six fields fail the whole file.
 * A repeated reference number overwrites the earlier row.
 */
export function parseLoadTable(text: string): Map<string, LoadRecord> {
  const records = new Map<string, LoadRecord>();
  const lines = text.split('\n');

  for (let index = 1; index < lines.length; index++) {
    const line = lines[index].trim();
    if (!line) continue;

    const values = line.split(',');
    if (values.length < LOAD_RECORD_FIELDS.length) {
      throw new LoadTableParseError(
        `Expected ${LOAD_RECORD_FIELDS.length} fields on line ${index + 1}, found ${values.length}`,
        index + 1
      );
    }

    const [reference_number, origin, destination, equipment_type, rate, commodity] = values;
    records.set(reference_number, {
      reference_number,
      origin,
      destination,
      equipment_type,
      rate,
      commodity,
    });
  }

  return records;
}

// Read and parse the loads file; failures degrade to an empty table
export async function loadTable(path: string): Promise<ReadonlyMap<string, LoadRecord>> {
  try {
    const text = await fs.promises.readFile(path, 'utf8');
    const records = parseLoadTable(text);

    if (records.size === 0) {
      logWarn('Load data is empty', { path });
    } else {
      logInfo('Load data loaded', { path, records: records.size });
    }

    return records;
  } catch (error) {
    logError(
      `Error loading load data: ${describeError(error)}`,
      error instanceof Error ? error : undefined,
      { path }
    );
    return new Map();
  }
}

/**
 * Read-only reference table of loads, built once before the server accepts
 * traffic and shared with the handlers.
 */
export class LoadTable {
  private readonly records: ReadonlyMap<string, Readonly<LoadRecord>>;

  private constructor(records: ReadonlyMap<string, LoadRecord>) {
    const frozen = new Map<string, Readonly<LoadRecord>>();
    records.forEach((record, key) => frozen.set(key, Object.freeze({ ...record })));
    this.records = frozen;
  }

  static async fromFile(path: string): Promise<LoadTable> {
    return new LoadTable(await loadTable(path));
  }

  static fromRecords(records: Iterable<LoadRecord>): LoadTable {
    const map = new Map<string, LoadRecord>();
    for (const record of records) {
      map.set(record.reference_number, record);
    }
    return new LoadTable(map);
  }

  static empty(): LoadTable {
    return new LoadTable(new Map());
  }

  get size(): number {
    return this.records.size;
  }

  // False when the file was missing, unreadable or had no rows
  get isAvailable(): boolean {
    return this.records.size > 0;
  }

  lookup(referenceNumber: string): LoadRecord {
    if (!this.isAvailable) {
      throw new ServiceUnavailableError('No load data available');
    }

    const record = this.records.get(referenceNumber);
    if (!record) {
      throw new NotFoundError(`Load not found: ${referenceNumber}`);
    }

    return { ...record };
  }
}

export default LoadTable;
