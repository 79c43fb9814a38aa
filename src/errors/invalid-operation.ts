import { TickplotError } from './base.ts';

/**
 * Error returned when a chart transition is attempted out of phase order,
 * e.g. adding an axis once a plot has been bound to the plot area.
 */
export class InvalidOperationError extends TickplotError {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string, hint?: string) {
    super('invalid operation', hint);
    this.name = 'InvalidOperationError';
    this.operation = operation;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `chart.${this.operation}(...)`;
  }

  protected override _getDetail(): string {
    return `'${this.operation}' ${this.reason}`;
  }
}
