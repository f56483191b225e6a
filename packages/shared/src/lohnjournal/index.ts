/**
 * Lohnjournal extraction core: synchronous and free of I/O apart from layout loading.
 */

export * from './types';
export * from './errors';
export * from './number-decoder';
export * from './field-layout';
export * from './layout';
export * from './row-assembler';
export * from './month-resolver';
export * from './record-extractor';
