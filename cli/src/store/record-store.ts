import fs from 'fs';

import { DEVICE_FIELDS, recordValues, type DeviceRecord } from '../types';
import {
  DuplicateRecordError,
  PermissionDeniedError,
  UnknownFailureError,
  isErrnoException,
} from '../errors';
import { formatRow, formatTable, parseTable, type StoredTable } from './csv';

const KEY_COLUMN = 'mac_address';

export type StoreFailure = PermissionDeniedError | UnknownFailureError;

export type UpsertResult =
  | { status: 'written' }
  | { status: 'duplicate'; error: DuplicateRecordError }
  | { status: 'failed'; error: StoreFailure };

export type ReplaceResult =
  | { status: 'written' }
  | { status: 'replaced' }
  | { status: 'failed'; error: StoreFailure };

export function classifyStoreError(err: unknown, storePath: string): StoreFailure {
  if (isErrnoException(err) && (err.code === 'EACCES' || err.code === 'EPERM')) {
    return new PermissionDeniedError(storePath);
  }
  return new UnknownFailureError(err);
}

/**
 * Create the store if it is missing. Opening with 'a' never truncates and,
 * like the rest of the store, never creates parent directories.
 */
async function ensureStore(storePath: string): Promise<void> {
  const handle = await fs.promises.open(storePath, 'a');
  await handle.close();
}

/**
 * What the store holds before a write. A file with no header (only blank
 * lines or a byte-order mark) counts as empty.
 */
type StoreContents =
  | { kind: 'empty' }
  | { kind: 'table'; table: StoredTable; matchIndex: number };

function inspectStore(raw: Buffer, macAddress: string): StoreContents {
  if (raw.length === 0) {
    return { kind: 'empty' };
  }
  const table = parseTable(raw.toString('utf-8'));
  if (table.columns.length === 0) {
    return { kind: 'empty' };
  }
  const keyIndex = table.columns.indexOf(KEY_COLUMN);
  if (keyIndex === -1) {
    throw new Error(`Store has no ${KEY_COLUMN} column`);
  }
  return { kind: 'table', table, matchIndex: table.rows.findIndex((row) => row[keyIndex] === macAddress) };
}

async function writeAt(handle: fs.promises.FileHandle, text: string, position: number): Promise<void> {
  const buffer = Buffer.from(text, 'utf-8');
  await handle.write(buffer, 0, buffer.length, position);
}

/**
 * Append the record to the end of the store. An empty store gets the header
 * first, replacing any blank lines it held. `raw` is everything currently in
 * the file.
 */
async function appendRecord(
  handle: fs.promises.FileHandle,
  raw: Buffer,
  contents: StoreContents,
  record: DeviceRecord,
): Promise<void> {
  if (contents.kind === 'empty') {
    if (raw.length > 0) {
      await handle.truncate(0);
    }
    await writeAt(handle, formatRow(DEVICE_FIELDS) + formatRow(recordValues(record)), 0);
    return;
  }
  const separator = raw[raw.length - 1] === 0x0a ? '' : '\n';
  await writeAt(handle, separator + formatRow(recordValues(record)), raw.length);
}

/**
 * Add a device record to the store unless a row with the same MAC address is
 * already there. Duplicates are refused and leave the file untouched.
 *
 * Never throws: permission problems and other I/O failures come back as a
 * `failed` result. A store whose header lacks a mac_address column is refused
 * the same way.
 */
export async function upsert(record: DeviceRecord, storePath: string): Promise<UpsertResult> {
  try {
    await ensureStore(storePath);
    const handle = await fs.promises.open(storePath, 'r+');
    try {
      const raw = await handle.readFile();
      const contents = inspectStore(raw, record.mac_address);
      if (contents.kind === 'table' && contents.matchIndex !== -1) {
        return { status: 'duplicate', error: new DuplicateRecordError(record.mac_address) };
      }
      await appendRecord(handle, raw, contents, record);
      return { status: 'written' };
    } finally {
      await handle.close();
    }
  } catch (err) {
    return { status: 'failed', error: classifyStoreError(err, storePath) };
  }
}

/**
 * Like {@link upsert}, but a row with the same MAC address is overwritten
 * with the incoming values instead of being kept. Overwriting rewrites the
 * whole file.
 */
export async function replace(record: DeviceRecord, storePath: string): Promise<ReplaceResult> {
  try {
    await ensureStore(storePath);
    const handle = await fs.promises.open(storePath, 'r+');
    try {
      const raw = await handle.readFile();
      const contents = inspectStore(raw, record.mac_address);
      if (contents.kind === 'table' && contents.matchIndex !== -1) {
        const { table, matchIndex } = contents;
        const existing = table.rows[matchIndex];
        table.rows[matchIndex] = table.columns.map((column, position) => {
          const field = DEVICE_FIELDS.find((candidate) => candidate === column);
          return field ? record[field] : existing[position] ?? '';
        });
        await handle.truncate(0);
        await writeAt(handle, formatTable(table), 0);
        return { status: 'replaced' };
      }
      await appendRecord(handle, raw, contents, record);
      return { status: 'written' };
    } finally {
      await handle.close();
    }
  } catch (err) {
    return { status: 'failed', error: classifyStoreError(err, storePath) };
  }
}

export async function readRecords(storePath: string): Promise<StoredTable> {
  if (!fs.existsSync(storePath)) {
    return { columns: [], rows: [] };
  }
  const content = await fs.promises.readFile(storePath, 'utf-8');
  return content.length > 0 ? parseTable(content) : { columns: [], rows: [] };
}

export function describeStoreResult(result: UpsertResult | ReplaceResult, storePath: string): string[] {
  switch (result.status) {
    case 'written':
      return [`Data successfully written to ${storePath}`];
    case 'replaced':
      return [`Existing record updated in ${storePath}`];
    case 'duplicate':
      return [`Error: Writing to ${storePath} failed`, 'Reason: This machine has already been catalogued'];
    case 'failed':
      if (result.error instanceof PermissionDeniedError) {
        return [`Error: Writing to ${storePath} failed`, `Reason: ${result.error.message}`];
      }
      return [`Writing to CSV file failed due to unexpected reason: ${result.error.message}`];
  }
}
