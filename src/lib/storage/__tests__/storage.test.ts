/**
 * Storage Tests
 * JSONL sink, failure log and record reading against a temp directory
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { makeRecord, muteConsole } from '../../../__tests__/helpers/fixtures';
import { CrawlSetupError } from '../../scraping/errors';
import { FailureLog, failureLogPath } from '../failure-log';
import { hasContent, parseCrawlRecord, readLastRecord, readLinesFromEnd, readRecords } from '../record-reader';
import { JsonlRecordSink } from '../record-sink';

describe('storage', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'regcrawl-storage-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('JsonlRecordSink', () => {
    it('should write one JSON line per record and keep non-ASCII text', async () => {
      const filePath = path.join(tmpDir, 'out', 'MT.jsonl');
      const sink = await JsonlRecordSink.open(filePath, 'w');

      await sink.write(makeRecord([0, 0], { title: 'Rule 1 › Scope' }));
      await sink.write(makeRecord([0, 1]));
      await sink.close();

      const lines = (await fs.readFile(filePath, 'utf-8')).split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[2]).toBe('');
      expect(lines[0]).toContain('"title":"Rule 1 › Scope"');
      expect(JSON.parse(lines[1])).toEqual(makeRecord([0, 1]));
    });

    it('should truncate in write mode and keep content in append mode', async () => {
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(filePath, 'old line\n', 'utf-8');

      const appending = await JsonlRecordSink.open(filePath, 'a');
      await appending.write({ n: 1 });
      await appending.close();
      expect(await fs.readFile(filePath, 'utf-8')).toBe('old line\n{"n":1}\n');

      const truncating = await JsonlRecordSink.open(filePath, 'w');
      await truncating.write({ n: 2 });
      await truncating.close();
      expect(await fs.readFile(filePath, 'utf-8')).toBe('{"n":2}\n');
    });

    it('should start a new line when appending after a torn line', async () => {
      const warn = muteConsole('warn');
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(filePath, '{"n":1}\n{"n":', 'utf-8');

      const sink = await JsonlRecordSink.open(filePath, 'a');
      await sink.write({ n: 3 });
      await sink.close();

      expect(await fs.readFile(filePath, 'utf-8')).toBe('{"n":1}\n{"n":\n{"n":3}\n');
      expect(warn).toHaveBeenCalledWith(`WARNING: ${filePath} ends with a partial line, appending after it`);
    });

    it('should refuse writes after close', async () => {
      const sink = await JsonlRecordSink.open(path.join(tmpDir, 'x.jsonl'), 'w');
      await sink.close();
      await expect(sink.write({})).rejects.toThrow('is closed');
    });

    it('should fail setup when the file cannot be opened', async () => {
      const blocker = path.join(tmpDir, 'blocker');
      await fs.writeFile(blocker, '', 'utf-8');

      await expect(JsonlRecordSink.open(path.join(blocker, 'MT.jsonl'), 'w')).rejects.toBeInstanceOf(CrawlSetupError);
    });
  });

  describe('FailureLog', () => {
    it('should append timestamped entries to a jurisdiction file', async () => {
      const log = new FailureLog(failureLogPath(tmpDir, 'MT'));
      const when = new Date('2026-01-02T03:04:05.000Z');

      await log.append({ url: 'https://regs.test/a/', lex_path: [1, 2], error: 'HTTP 404' }, when);
      await log.append({ url: 'https://regs.test/b/', lex_path: null, error: 'boom' }, when);

      const content = await fs.readFile(path.join(tmpDir, 'failed_MT.jsonl'), 'utf-8');
      expect(content.trim().split('\n').map((line) => JSON.parse(line))).toEqual([
        { url: 'https://regs.test/a/', lex_path: [1, 2], error: 'HTTP 404', timestamp: '2026-01-02T03:04:05.000Z' },
        { url: 'https://regs.test/b/', lex_path: null, error: 'boom', timestamp: '2026-01-02T03:04:05.000Z' },
      ]);
      expect(log.count).toBe(2);
    });

    it('should report a write error without throwing', async () => {
      const error = muteConsole('error');
      const blocker = path.join(tmpDir, 'blocker');
      await fs.writeFile(blocker, '', 'utf-8');
      const log = new FailureLog(path.join(blocker, 'failed_MT.jsonl'));

      await log.append({ url: 'https://regs.test/a/', lex_path: [0], error: 'x' });

      expect(log.count).toBe(0);
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe('readLinesFromEnd', () => {
    async function linesFromEnd(filePath: string): Promise<string[]> {
      const lines: string[] = [];
      for await (const line of readLinesFromEnd(filePath)) {
        lines.push(line);
      }
      return lines;
    }

    it('should yield nothing for a missing or blank file', async () => {
      expect(await linesFromEnd(path.join(tmpDir, 'none.jsonl'))).toEqual([]);

      const blank = path.join(tmpDir, 'blank.jsonl');
      await fs.writeFile(blank, '\n\n', 'utf-8');
      expect(await linesFromEnd(blank)).toEqual([]);
    });

    it('should yield lines last first and skip blank ones', async () => {
      const filePath = path.join(tmpDir, 'a.jsonl');
      await fs.writeFile(filePath, 'first\n\nsecond\n\n', 'utf-8');
      expect(await linesFromEnd(filePath)).toEqual(['second', 'first']);
    });

    it('should read a single line without a newline', async () => {
      const filePath = path.join(tmpDir, 'one.jsonl');
      await fs.writeFile(filePath, 'only', 'utf-8');
      expect(await linesFromEnd(filePath)).toEqual(['only']);
    });

    it('should join lines that span read chunks', async () => {
      const filePath = path.join(tmpDir, 'long.jsonl');
      const longLine = 'x'.repeat(10000);
      await fs.writeFile(filePath, `short\n${longLine}\n`, 'utf-8');
      expect(await linesFromEnd(filePath)).toEqual([longLine, 'short']);
    });
  });

  describe('readLastRecord', () => {
    it('should parse the last record', async () => {
      const filePath = path.join(tmpDir, 'MT.jsonl');
      const lines = [makeRecord([2, 1, 2]), makeRecord([2, 1, 3])].map((record) => JSON.stringify(record));
      await fs.writeFile(filePath, `${lines.join('\n')}\n`, 'utf-8');

      expect(await readLastRecord(filePath)).toEqual(makeRecord([2, 1, 3]));
    });

    it('should take the cursor from the last complete line before a torn write', async () => {
      const warn = muteConsole('warn');
      const filePath = path.join(tmpDir, 'MT.jsonl');
      const lines = [makeRecord([0, 0]), makeRecord([0, 1])].map((record) => JSON.stringify(record));
      const content = `${lines.join('\n')}\n{"url": "https://regs`;
      await fs.writeFile(filePath, content, 'utf-8');

      expect(await readLastRecord(filePath)).toEqual(makeRecord([0, 1]));
      expect(warn).toHaveBeenCalledWith(`WARNING: Ignoring unreadable line at the end of ${filePath}`);
      expect(await fs.readFile(filePath, 'utf-8')).toBe(content);
    });

    it('should find a record further back than one read chunk', async () => {
      muteConsole('warn');
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(filePath, `${JSON.stringify(makeRecord([4, 2]))}\n${'x'.repeat(9000)}\n\n`, 'utf-8');

      expect(await readLastRecord(filePath)).toEqual(makeRecord([4, 2]));
    });

    it('should return null when no line is a record', async () => {
      muteConsole('warn');
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(filePath, '{"url": "https://regs', 'utf-8');

      expect(await readLastRecord(filePath)).toBeNull();
      expect(await readLastRecord(path.join(tmpDir, 'none.jsonl'))).toBeNull();
    });
  });

  describe('hasContent', () => {
    it('should be false for a missing or empty file', async () => {
      const empty = path.join(tmpDir, 'empty.jsonl');
      await fs.writeFile(empty, '', 'utf-8');

      expect(await hasContent(path.join(tmpDir, 'none.jsonl'))).toBe(false);
      expect(await hasContent(empty)).toBe(false);
    });

    it('should be true once anything was written', async () => {
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(filePath, '{', 'utf-8');
      expect(await hasContent(filePath)).toBe(true);
    });
  });

  describe('readRecords', () => {
    it('should load records in file order and skip blank and broken lines', async () => {
      const warn = muteConsole('warn');
      const filePath = path.join(tmpDir, 'MT.jsonl');
      await fs.writeFile(
        filePath,
        [JSON.stringify(makeRecord([0, 0])), '', 'not json', '{"url":"x"}', JSON.stringify(makeRecord([0, 1]))].join('\n'),
        'utf-8'
      );

      const records = await readRecords(filePath);

      expect(records.map((record) => record.lex_path)).toEqual([
        [0, 0],
        [0, 1],
      ]);
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('parseCrawlRecord', () => {
    it('should accept a null citation and reject a bad lex_path', () => {
      expect(parseCrawlRecord(makeRecord([1]))).toEqual(makeRecord([1]));
      expect(parseCrawlRecord({ ...makeRecord([1]), lex_path: ['1'] })).toBeNull();
      expect(parseCrawlRecord([makeRecord([1])])).toBeNull();
    });
  });
});
