/**
 * Raised when source text is not valid Python. The only error the
 * analysis engine propagates.
 */
export class PythonSyntaxError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'PythonSyntaxError';
    this.line = line;
    this.column = column;
  }
}
