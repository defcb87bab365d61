/**
 * Error types thrown synchronously by plot and grid operations.
 *
 * Failed file writes are not errors: `savePng` / `saveSvg` resolve `false`.
 *
 * @module errors
 */

/**
 * Base class for every error this package throws.
 */
export class PlotError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'PlotError';
    this.hint = hint;
  }

  format(): string {
    const lines: string[] = [];
    lines.push(`error: ${this.message}`);
    lines.push(`  --> ${this.getOperation()}`);
    lines.push('   |');
    lines.push(`   └── ${this.getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected getOperation(): string {
    return '(plot)';
  }

  protected getDetail(): string {
    return this.message;
  }
}

/**
 * Caller supplied data or arguments the operation cannot accept:
 * mismatched lengths, mixed histogram modes, invalid labels or bin counts.
 */
export class InvalidArgumentError extends PlotError {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string, hint?: string) {
    super(`${operation}: ${reason}`, hint);
    this.name = 'InvalidArgumentError';
    this.operation = operation;
    this.reason = reason;
  }

  protected override getOperation(): string {
    return this.operation;
  }

  protected override getDetail(): string {
    return this.reason;
  }
}

/**
 * Subplot cell index outside the grid.
 */
export class OutOfRangeError extends PlotError {
  readonly row: number;
  readonly col: number;
  readonly rows: number;
  readonly cols: number;

  constructor(row: number, col: number, rows: number, cols: number) {
    super(
      `Subplot index (${row}, ${col}) is outside a ${rows}x${cols} grid`,
      `valid rows are 0 to ${rows - 1}, valid columns are 0 to ${cols - 1}`
    );
    this.name = 'OutOfRangeError';
    this.row = row;
    this.col = col;
    this.rows = rows;
    this.cols = cols;
  }

  protected override getOperation(): string {
    return `getSubplot(${this.row}, ${this.col})`;
  }

  protected override getDetail(): string {
    return `grid has ${this.rows} row(s) and ${this.cols} column(s)`;
  }
}
