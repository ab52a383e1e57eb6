import type { TableList, TestOutcome } from '@core/types/harness';
import type { EventReader } from '@interpreter/grammar/EventReader';
import type { RunContext } from '@interpreter/context';
import { readTest } from '@interpreter/decoders/test-case';

/**
 * Decode the `tests` sequence, verifying each case in document order.
 */
export function readTests(reader: EventReader, context: RunContext, tables: TableList): TestOutcome[] {
  reader.expect('sequence-start');

  const outcomes: TestOutcome[] = [];
  for (;;) {
    const opensCase = reader.take(event => {
      if (event.type === 'sequence-start') {
        return true;
      }
      if (event.type === 'sequence-end') {
        return false;
      }
      throw reader.violation('Unexpected event', event);
    }, 'sequence-end');

    if (!opensCase) {
      return outcomes;
    }
    outcomes.push(readTest(reader, context, tables));
  }
}
