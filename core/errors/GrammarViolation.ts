import type { ParserEventType } from '@core/types/events';
import { CheckError, ErrorSeverity } from '@core/errors/CheckError';
import { formatLocationForError } from '@core/utils/locationFormatter';

export interface GrammarViolationOptions {
  filePath: string;
  /** 0-based line index of the offending event */
  line: number;
  /** Event type the grammar required at this position */
  expected?: ParserEventType;
  /** Event type actually found, or 'end of stream' */
  actual?: ParserEventType | 'end of stream';
  cause?: unknown;
}

/**
 * Thrown when the event stream does not match the test document grammar.
 *
 * Grammar violations are always fatal: the document format has no optional
 * or ambiguous structure to resynchronize on.
 */
export class GrammarViolation extends CheckError {
  public readonly filePath: string;
  public readonly line: number;
  public readonly expected?: ParserEventType;
  public readonly actual?: ParserEventType | 'end of stream';

  constructor(message: string, options: GrammarViolationOptions) {
    super(message, {
      code: 'GRAMMAR_VIOLATION',
      severity: ErrorSeverity.Fatal,
      details: {
        expected: options.expected,
        actual: options.actual
      },
      sourceLocation: { filePath: options.filePath, line: options.line },
      cause: options.cause
    });

    this.name = 'GrammarViolation';
    this.filePath = options.filePath;
    this.line = options.line;
    this.expected = options.expected;
    this.actual = options.actual;

    Object.setPrototypeOf(this, GrammarViolation.prototype);
  }

  /**
   * Build the standard type-mismatch violation.
   */
  static mismatch(
    expected: ParserEventType,
    actual: ParserEventType | 'end of stream',
    location: { filePath: string; line: number }
  ): GrammarViolation {
    return new GrammarViolation(`expected ${expected} (actual ${actual})`, {
      ...location,
      expected,
      actual
    });
  }

  /**
   * Compiler-style one-line diagnostic: `<file>:<line>: error: <message>`
   */
  toDiagnostic(): string {
    return `${formatLocationForError(this.sourceLocation)}: error: ${this.message}`;
  }
}
