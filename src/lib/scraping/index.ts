/**
 * Scraping Utilities - Barrel Export
 *
 * - Header spoofing & browser fingerprinting
 * - Fetch failure taxonomy & retry guidance
 * - Paced HTTP page fetcher
 */

export * from './scraping.types';
export * from './errors';
export * from './headers';
export * from './page-fetcher';
