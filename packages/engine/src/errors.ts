/**
 * Error taxonomy.
 *
 * Only ConfigurationError escapes a run. Everything else is converted into a
 * Finding (or a skip marker) where it happens.
 */

export interface SourcePosition {
  line: number;
  column: number;
}

/** A unit could not be parsed. The unit is skipped; the run continues. */
export class ParseError extends Error {
  readonly unit: string;
  readonly position: SourcePosition;

  constructor(unit: string, position: SourcePosition, message: string) {
    super(`${unit}:${position.line}:${position.column} ${message}`);
    this.name = "ParseError";
    this.unit = unit;
    this.position = position;
  }

  /** The message without the location prefix. */
  get reason(): string {
    const prefix = `${this.unit}:${this.position.line}:${this.position.column} `;
    return this.message.startsWith(prefix) ? this.message.slice(prefix.length) : this.message;
  }
}

/** Entry-point rules or other settings make the run meaningless. Fatal. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
