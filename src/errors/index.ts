/**
 * Error module - exports all tickplot error types.
 */

export { TickplotError } from './base.ts';
export { ConfigError } from './config-error.ts';
export { FileError } from './file-error.ts';
export { InvalidOperationError } from './invalid-operation.ts';
