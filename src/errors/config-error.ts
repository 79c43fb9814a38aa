import { TickplotError } from './base.ts';

/**
 * Error thrown when a layout configuration value is unusable.
 */
export class ConfigError extends TickplotError {
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super('config error', `'${key}' must be a non-negative integer`);
    this.name = 'ConfigError';
    this.key = key;
    this.value = value;
  }

  protected override _getExpression(): string {
    return `Chart.builder({ ${this.key}: ${String(this.value)} })`;
  }

  protected override _getDetail(): string {
    return `invalid layout value ${String(this.value)} for '${this.key}'`;
  }
}
