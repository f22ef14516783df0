#!/usr/bin/env node
/**
 * CLI Entry Point
 * regcrawl crawl | verify
 */

import { CrawlError, describeError } from './lib/scraping/errors';
import {
  formatCrawlSummary,
  formatVerificationReport,
  ICliCommand,
  parseArgs,
  regulationsService,
  USAGE,
  UsageError,
} from './modules/regulations';

const EXIT_OK = 0;
const EXIT_INVALID = 1;
const EXIT_USAGE = 2;

export const main = async (argv: string[]): Promise<number> => {
  let command: ICliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.command) {
    case 'help':
      console.log(USAGE);
      return EXIT_OK;

    case 'crawl': {
      const summary = await regulationsService.crawlJurisdiction(command.jurisdiction, {
        resume: command.resume,
        workers: command.threads,
        maxRetries: command.maxRetries,
        outputDir: command.outputDir,
      });
      console.log('');
      formatCrawlSummary(summary).forEach((line) => console.log(line));
      return EXIT_OK;
    }

    case 'verify': {
      const report = await regulationsService.verifyJurisdiction(command.jurisdiction, {
        samples: command.samples,
        outputDir: command.outputDir,
      });
      formatVerificationReport(report).forEach((line) => console.log(line));
      return report.valid ? EXIT_OK : EXIT_INVALID;
    }
  }
};

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof CrawlError) {
        console.error(`❌ ${error.message}`);
      } else {
        console.error('❌ Unexpected error:', describeError(error));
      }
      process.exitCode = EXIT_INVALID;
    });
}
