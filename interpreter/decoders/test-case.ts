import {
  defaultTestOptions,
  type TableList,
  type TestCase,
  type TestOptions,
  type TestOutcome
} from '@core/types/harness';
import type { EventReader } from '@interpreter/grammar/EventReader';
import { recordOutcome, type RunContext } from '@interpreter/context';
import { readOptions } from '@interpreter/decoders/options';
import { interpreterLogger as logger } from '@core/utils/logger';

/**
 * Decode one `[word, expected, {options}?]` case and verify it.
 *
 * The opening sequence-start has already been consumed. The case counts as
 * a failure when its xfail expectation agrees with the verifier's match,
 * i.e. an expected failure that matched or an ordinary case that did not.
 */
export function readTest(reader: EventReader, context: RunContext, tables: TableList): TestOutcome {
  const word = reader.expectScalar('Word expected').value;
  const expected = reader.expectScalar('Translation expected').value;

  const hasOptions = reader.take(event => {
    if (event.type === 'mapping-start') {
      return true;
    }
    if (event.type === 'sequence-end') {
      return false;
    }
    throw reader.violation('Unexpected event', event);
  }, 'sequence-end');

  let options: TestOptions = defaultTestOptions();
  if (hasOptions) {
    options = readOptions(reader);
    reader.expect('sequence-end');
  }

  const testCase: TestCase = { word, expected, options };
  const matched = context.verifier.verify({
    tables,
    word,
    typeform: options.typeform,
    expected,
    mode: options.mode,
    cursorPos: options.cursorPos,
    brlCursorPos: options.brlCursorPos
  });

  const failed = options.xfail === matched;
  if (failed && options.xfail) {
    context.print(`Failure expected but translation matched: '${word}'`);
  }
  recordOutcome(context, failed);

  logger.debug('Verified test case', { word, matched, failed, line: reader.line });
  return { testCase, matched, failed };
}
