import type { FlagSet } from '@core/types/harness';
import type { EventReader } from '@interpreter/grammar/EventReader';
import type { RunContext } from '@interpreter/context';

/**
 * Decode the `flags` mapping. Every scalar inside it, key or value, is
 * printed and collected; flags are not validated.
 */
export function readFlags(reader: EventReader, context: RunContext): FlagSet {
  reader.expect('mapping-start');

  const flags = new Set<string>();
  let done = false;
  while (!done) {
    done = reader.take(event => {
      if (event.type === 'mapping-end') {
        return true;
      }
      if (event.type !== 'scalar') {
        throw reader.mismatch('scalar', event);
      }
      context.print(`Flag ${event.value}`);
      flags.add(event.value);
      return false;
    }, 'mapping-end');
  }
  return flags;
}
