/**
 * Markup System
 * Main export file for page parsing
 */

export * from './markup.types';
export * from './site-layout';
export * from './markup-document';
export * from './content-extractor';
