import type { EventSource } from '@core/types/events';
import type { FlagSet, RunSummary, TableList, TestOutcome } from '@core/types/harness';
import { EventReader } from '@interpreter/grammar/EventReader';
import type { RunContext } from '@interpreter/context';
import { readTables } from '@interpreter/decoders/tables';
import { readFlags } from '@interpreter/decoders/flags';
import { readTests } from '@interpreter/decoders/test-list';
import { interpreterLogger as logger } from '@core/utils/logger';

/**
 * Driver states in the only order they may be entered. `flags` is the one
 * state that may be skipped.
 */
export const DRIVER_STATES = [
  'start',
  'stream-start',
  'document-start',
  'root-mapping-start',
  'tables',
  'flags',
  'tests',
  'root-mapping-end',
  'document-end',
  'stream-end',
  'done'
] as const;

export type DriverState = (typeof DRIVER_STATES)[number];

const OPTIONAL_STATES: ReadonlySet<DriverState> = new Set<DriverState>(['flags']);

export interface RunResult {
  summary: RunSummary;
  tables: TableList;
  flags: FlagSet;
  outcomes: TestOutcome[];
  /** 0 when every case passed, 1 otherwise */
  exitCode: number;
}

export interface DocumentDriverOptions {
  /** Styles the SUCCESS/FAILURE word of the summary line */
  paintStatus?: (status: string, passed: boolean) => string;
}

export function formatSummary(
  summary: RunSummary,
  paint: (status: string, passed: boolean) => string = status => status
): string {
  const passed = summary.failures === 0;
  const status = paint(passed ? 'SUCCESS' : 'FAILURE', passed);
  return `${status} (${summary.total} tests, ${summary.failures} failures)`;
}

/**
 * Top-level state machine for one test document.
 *
 * Walks stream, document and root mapping, hands each section to its
 * decoder and prints the summary once the stream is closed. Any grammar
 * violation propagates out of `run` before the summary is printed.
 */
export class DocumentDriver {
  private current: DriverState = 'start';
  private readonly reader: EventReader;

  constructor(
    source: EventSource,
    private readonly context: RunContext,
    private readonly options: DocumentDriverOptions = {}
  ) {
    this.reader = new EventReader(source, context.filePath);
  }

  get state(): DriverState {
    return this.current;
  }

  run(): RunResult {
    const { reader, context } = this;

    this.advance('stream-start');
    reader.take(event => {
      if (event.type !== 'stream-start') {
        throw reader.mismatch('stream-start', event);
      }
      context.print(`Encoding ${event.encoding}`);
    }, 'stream-start');

    this.advance('document-start');
    reader.expect('document-start');

    this.advance('root-mapping-start');
    reader.expect('mapping-start');

    this.advance('tables');
    const tables = readTables(reader, context);
    context.print(`Tables: ${tables}`);

    const section = reader.take(event => {
      if (event.type !== 'scalar') {
        throw reader.mismatch('scalar', event);
      }
      if (event.value === 'flags' || event.value === 'tests') {
        return event.value;
      }
      throw reader.violation('flags or tests expected', event);
    }, 'scalar');

    let flags: FlagSet = new Set<string>();
    if (section === 'flags') {
      this.advance('flags');
      flags = readFlags(reader, context);
      reader.expectKeyword('tests', 'tests expected');
    }

    this.advance('tests');
    const outcomes = readTests(reader, context, tables);

    this.advance('root-mapping-end');
    reader.expect('mapping-end');

    this.advance('document-end');
    reader.expect('document-end');

    this.advance('stream-end');
    reader.expect('stream-end');

    this.advance('done');
    const summary = { ...context.summary };
    context.print(formatSummary(summary, this.options.paintStatus));
    logger.info('Document checked', { file: context.filePath, ...summary });

    return {
      summary,
      tables,
      flags,
      outcomes,
      exitCode: summary.failures === 0 ? 0 : 1
    };
  }

  /**
   * Move to `next`, which must follow the current state directly or skip
   * only optional states.
   */
  advance(next: DriverState): void {
    const from = DRIVER_STATES.indexOf(this.current);
    const to = DRIVER_STATES.indexOf(next);
    const skipped = DRIVER_STATES.slice(from + 1, to);

    if (to <= from || skipped.some(state => !OPTIONAL_STATES.has(state))) {
      throw new Error(`Invalid driver transition: ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}
