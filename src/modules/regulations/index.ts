/**
 * Regulations Module
 */

export * from './regulations.types';
export * from './regulations.args';
export * from './regulations.report';
export * from './regulations.service';
