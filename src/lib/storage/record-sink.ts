/**
 * JSONL Record Sink
 * Append-only writer, one JSON object per line
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CrawlSetupError, describeError } from '../scraping/errors';
import { isFileNotFound } from './fs-errors';
import { RecordWriter, SinkMode } from './storage.types';

async function endsMidLine(filePath: string): Promise<boolean> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    if (isFileNotFound(error)) return false;
    throw error;
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) return false;
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] !== 0x0a;
  } finally {
    await handle.close();
  }
}

export class JsonlRecordSink<T> implements RecordWriter<T> {
  private closed = false;

  private constructor(
    private readonly handle: fs.FileHandle,
    readonly filePath: string
  ) {}

  /**
   * Open the output file, creating its directory. Failure here is fatal for the run.
   */
  static async open<T>(filePath: string, mode: SinkMode): Promise<JsonlRecordSink<T>> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const partial = mode === 'a' && (await endsMidLine(filePath));
      const handle = await fs.open(filePath, mode);
      if (partial) {
        // Close the torn line so the next record starts on its own line
        console.warn(`WARNING: ${filePath} ends with a partial line, appending after it`);
        await handle.write('\n', null, 'utf-8');
      }
      return new JsonlRecordSink<T>(handle, filePath);
    } catch (error) {
      throw new CrawlSetupError(`Cannot open output file ${filePath}: ${describeError(error)}`);
    }
  }

  /**
   * One write call per record; non-ASCII text is written as-is
   */
  async write(record: T): Promise<void> {
    if (this.closed) {
      throw new Error(`Record sink ${this.filePath} is closed`);
    }
    await this.handle.write(`${JSON.stringify(record)}\n`, null, 'utf-8');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
