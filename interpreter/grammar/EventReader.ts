import type { EventSource, ParserEvent, ParserEventType } from '@core/types/events';
import { GrammarViolation } from '@core/errors/GrammarViolation';

export interface ScalarValue {
  value: string;
  line: number;
}

/**
 * Grammar primitives over a forward-only event source.
 *
 * Every pull goes through `take`, which holds exactly one event for the
 * duration of its visitor and releases it on every exit path. A visitor must
 * not pull again; doing so is a programming error and throws immediately.
 */
export class EventReader {
  private holding = false;
  private lastLine = 0;

  constructor(
    private readonly source: EventSource,
    readonly filePath: string
  ) {}

  /** Line index of the most recently pulled event */
  get line(): number {
    return this.lastLine;
  }

  /**
   * Pull one event, hand it to `visit`, then release it.
   *
   * @param expected - event type named in the diagnostic if the stream ends
   */
  take<T>(visit: (event: ParserEvent) => T, expected?: ParserEventType): T {
    if (this.holding) {
      throw new Error('Cannot pull an event while another one is held');
    }

    const result = this.source.next();

    if (result.status === 'error') {
      this.lastLine = result.line;
      throw new GrammarViolation(`Error in YAML: ${result.message}`, {
        filePath: this.filePath,
        line: result.line
      });
    }

    if (result.status === 'end') {
      if (expected) {
        throw GrammarViolation.mismatch(expected, 'end of stream', this.locate());
      }
      throw new GrammarViolation('unexpected end of stream', this.locate());
    }

    const event = result.event;
    this.holding = true;
    this.lastLine = event.line;
    try {
      return visit(event);
    } finally {
      this.holding = false;
      this.source.release(event);
    }
  }

  /**
   * Require the next event to have the given type.
   */
  expect(type: ParserEventType): void {
    this.take(event => {
      if (event.type !== type) {
        throw this.mismatch(type, event);
      }
    }, type);
  }

  /**
   * Require a scalar and return a copy of its text.
   *
   * @param message - replaces the default type-mismatch message
   */
  expectScalar(message?: string): ScalarValue {
    return this.take(event => {
      if (event.type !== 'scalar') {
        throw message ? this.violation(message, event) : this.mismatch('scalar', event);
      }
      return { value: event.value, line: event.line };
    }, 'scalar');
  }

  /**
   * Require a scalar whose text equals `keyword`.
   */
  expectKeyword(keyword: string, message: string): void {
    this.take(event => {
      if (event.type !== 'scalar' || event.value !== keyword) {
        throw this.violation(message, event);
      }
    }, 'scalar');
  }

  violation(message: string, at: { line: number }): GrammarViolation {
    return new GrammarViolation(message, { filePath: this.filePath, line: at.line });
  }

  mismatch(expected: ParserEventType, actual: ParserEvent): GrammarViolation {
    return GrammarViolation.mismatch(expected, actual.type, {
      filePath: this.filePath,
      line: actual.line
    });
  }

  private locate(): { filePath: string; line: number } {
    return { filePath: this.filePath, line: this.lastLine };
  }
}
