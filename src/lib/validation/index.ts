/**
 * Verification System
 * Main export file for dataset verification
 */

export * from './verification.types';
export * from './section-validator';
export * from './content-spot-check';
export * from './section-walker';
export * from './verifier';
