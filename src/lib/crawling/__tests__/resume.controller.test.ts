/**
 * Resume Controller Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { makeRecord, muteConsole } from '../../../__tests__/helpers/fixtures';
import { ResumeController } from '../resume.controller';

describe('ResumeController', () => {
  let tmpDir: string;
  let outputPath: string;

  beforeEach(async () => {
    muteConsole('log');
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'regcrawl-resume-'));
    outputPath = path.join(tmpDir, 'MT.jsonl');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should truncate when resume is not requested', async () => {
    await fs.writeFile(outputPath, `${JSON.stringify(makeRecord([1, 0]))}\n`, 'utf-8');

    const resume = await ResumeController.fromOutput(outputPath, false);

    expect(resume.cursor).toBeNull();
    expect(resume.sinkMode).toBe('w');
  });

  it('should degrade to a full run without previous output', async () => {
    const resume = await ResumeController.fromOutput(outputPath, true);

    expect(resume.cursor).toBeNull();
    expect(resume.sinkMode).toBe('w');
  });

  it('should resume from the last complete record and append after a torn write', async () => {
    muteConsole('warn');
    await fs.writeFile(outputPath, `${JSON.stringify(makeRecord([2, 1, 3]))}\n{"url":`, 'utf-8');

    const resume = await ResumeController.fromOutput(outputPath, true);

    expect(resume.cursor).toEqual([2, 1, 3]);
    expect(resume.sinkMode).toBe('a');
  });

  it('should keep existing output when it holds no complete record', async () => {
    muteConsole('warn');
    await fs.writeFile(outputPath, '{"url":', 'utf-8');

    const resume = await ResumeController.fromOutput(outputPath, true);

    expect(resume.cursor).toBeNull();
    expect(resume.sinkMode).toBe('a');
  });

  it('should skip only sections wholly before the cursor', () => {
    const resume = new ResumeController([2, 1, 3]);

    expect([0, 1, 2, 3].map((index) => resume.skipsSection(index))).toEqual([true, true, false, false]);
    expect(resume.cursorForSection(2)).toEqual([2, 1, 3]);
    expect(resume.cursorForSection(3)).toBeUndefined();
    expect(new ResumeController(null).skipsSection(0)).toBe(false);
  });
});
