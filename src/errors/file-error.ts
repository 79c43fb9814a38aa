import { TickplotError } from './base.ts';

/**
 * Error thrown when a rendered document cannot be written.
 */
export class FileError extends TickplotError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string, hint?: string) {
    super('file error', hint);
    this.name = 'FileError';
    this.path = path;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `toFile('${this.path}')`;
  }

  protected override _getDetail(): string {
    return `cannot write '${this.path}': ${this.reason}`;
  }
}
