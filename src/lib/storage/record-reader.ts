/**
 * Record Reader
 * Loads persisted crawl output for resumption and verification
 */

import * as fs from 'fs/promises';
import { CrawlRecord } from '../crawling/crawling.types';
import { parseLexPath } from '../crawling/lex-path';
import { isFileNotFound } from './fs-errors';

const TAIL_CHUNK_SIZE = 4096;
const NEWLINE = 0x0a;

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one parsed line; null when a required field is missing or mistyped
 */
export function parseCrawlRecord(value: unknown): CrawlRecord | null {
  if (!isRecordObject(value)) {
    return null;
  }

  const { url, state, path, title, univ_cite, citation, content } = value;
  const lexPath = parseLexPath(value.lex_path);

  if (
    typeof url !== 'string' ||
    typeof state !== 'string' ||
    typeof path !== 'string' ||
    typeof title !== 'string' ||
    typeof univ_cite !== 'boolean' ||
    (citation !== null && typeof citation !== 'string') ||
    typeof content !== 'string' ||
    lexPath === null
  ) {
    return null;
  }

  return { url, state, path, title, univ_cite, citation, content, lex_path: [...lexPath] };
}

/**
 * Non-empty lines from the end of the file backwards, read in chunks so a
 * large output is never loaded whole. Yields nothing for a missing file.
 */
export async function* readLinesFromEnd(filePath: string): AsyncGenerator<string> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    if (isFileNotFound(error)) return;
    throw error;
  }

  try {
    const { size } = await handle.stat();
    let position = size;
    let pending: Buffer = Buffer.alloc(0);

    while (position > 0) {
      const length = Math.min(TAIL_CHUNK_SIZE, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      await handle.read(chunk, 0, length, position);
      pending = Buffer.concat([chunk, pending]);

      let newline = pending.lastIndexOf(NEWLINE);
      while (newline >= 0) {
        const line = pending.subarray(newline + 1).toString('utf-8').trim();
        pending = pending.subarray(0, newline);
        if (line) yield line;
        newline = pending.lastIndexOf(NEWLINE);
      }
    }

    const first = pending.toString('utf-8').trim();
    if (first) yield first;
  } finally {
    await handle.close();
  }
}

function parseRecordLine(line: string): CrawlRecord | null {
  try {
    return parseCrawlRecord(JSON.parse(line));
  } catch {
    return null;
  }
}

/**
 * The last complete record written by a previous run, or null when there is
 * none. Lines after it that do not parse (a write torn by a killed run) are
 * reported and passed over.
 */
export async function readLastRecord(filePath: string): Promise<CrawlRecord | null> {
  for await (const line of readLinesFromEnd(filePath)) {
    const record = parseRecordLine(line);
    if (record) {
      return record;
    }
    console.warn(`WARNING: Ignoring unreadable line at the end of ${filePath}`);
  }
  return null;
}

/**
 * True when the file exists and is not empty
 */
export async function hasContent(filePath: string): Promise<boolean> {
  try {
    const { size } = await fs.stat(filePath);
    return size > 0;
  } catch (error) {
    if (isFileNotFound(error)) return false;
    throw error;
  }
}

/**
 * Every record in file order. Blank lines are skipped; unreadable lines are
 * reported with their line number and skipped.
 */
export async function readRecords(filePath: string): Promise<CrawlRecord[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const records: CrawlRecord[] = [];

  content.split('\n').forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      console.warn(`WARNING: Skipping invalid JSON on line ${index + 1} of ${filePath}`);
      return;
    }

    const record = parseCrawlRecord(parsed);
    if (record) {
      records.push(record);
    } else {
      console.warn(`WARNING: Skipping malformed record on line ${index + 1} of ${filePath}`);
    }
  });

  return records;
}
