/**
 * Crawling System
 * Main export file for the resumable tree crawler
 */

export * from './crawling.types';
export * from './lex-path';
export * from './url-normalizer';
export * from './exclusion';
export * from './visited-set';
export * from './link-discoverer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './node-classifier';
export * from './traversal.engine';
export * from './resume.controller';
export * from './crawl-run.context';
export * from './crawl-runner';
