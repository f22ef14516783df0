/**
 * Storage System
 * Main export file for crawl output persistence
 */

export * from './storage.types';
export * from './fs-errors';
export * from './record-sink';
export * from './failure-log';
export * from './record-reader';
