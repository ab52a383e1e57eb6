import type { TableList } from '@core/types/harness';
import type { EventReader } from '@interpreter/grammar/EventReader';
import type { RunContext } from '@interpreter/context';

/**
 * Decode `tables: [a, b, ...]` into a comma-joined list.
 *
 * The `tables` keyword itself is consumed here. Names may not contain a comma
 * and the joined list must fit in the context's byte capacity.
 */
export function readTables(reader: EventReader, context: RunContext): TableList {
  reader.expectKeyword('tables', 'tables expected');
  reader.expect('sequence-start');

  const capacity = context.limits.maxTableListBytes;
  let list = '';
  let bytes = 0;

  for (;;) {
    const done = reader.take(event => {
      if (event.type === 'sequence-end') {
        return true;
      }
      if (event.type !== 'scalar') {
        throw reader.mismatch('scalar', event);
      }
      if (event.value.includes(',')) {
        throw reader.violation(`table name must not contain ',': ${event.value}`, event);
      }

      const separator = list.length > 0 ? 1 : 0;
      if (bytes + separator + event.length > capacity) {
        throw reader.violation(`table list exceeds ${capacity} bytes`, event);
      }
      list += (separator ? ',' : '') + event.value;
      bytes += separator + event.length;
      return false;
    }, 'sequence-end');

    if (done) {
      return list;
    }
  }
}
