/**
 * Resume Controller
 * Recovers the cursor left by an interrupted run and decides how output is reopened
 */

import { hasContent, readLastRecord } from '../storage/record-reader';
import { SinkMode } from '../storage/storage.types';
import { LexPath } from './crawling.types';
import { formatLexPath, isBeforeCursor } from './lex-path';

export class ResumeController {
  /**
   * @param sinkMode defaults to append when there is a cursor, truncate otherwise
   */
  constructor(
    readonly cursor: LexPath | null,
    readonly sinkMode: SinkMode = cursor ? 'a' : 'w'
  ) {}

  /**
   * A resume request never truncates existing output. Without a readable
   * record it crawls everything again and appends.
   */
  static async fromOutput(outputPath: string, resume: boolean): Promise<ResumeController> {
    if (!resume) {
      return new ResumeController(null);
    }

    const last = await readLastRecord(outputPath);
    if (last && last.lex_path.length > 0) {
      console.log(`Resuming from lex_path: ${formatLexPath(last.lex_path)}`);
      return new ResumeController(last.lex_path);
    }

    if (await hasContent(outputPath)) {
      console.log(`No complete record in ${outputPath}, crawling everything and appending`);
      return new ResumeController(null, 'a');
    }

    console.log(`No previous output at ${outputPath}, starting a full run`);
    return new ResumeController(null);
  }

  /**
   * Sections wholly before the cursor were finished by the previous run
   */
  skipsSection(index: number): boolean {
    return this.cursor !== null && isBeforeCursor([index], this.cursor);
  }

  /**
   * Only the section the cursor points into carries it
   */
  cursorForSection(index: number): LexPath | undefined {
    return this.cursor && index === this.cursor[0] ? this.cursor : undefined;
  }
}
