import { defaultTestOptions, type TestOptions } from '@core/types/harness';
import type { EventReader, ScalarValue } from '@interpreter/grammar/EventReader';
import { TRANSLATION_MODES, isTranslationModeName } from '@interpreter/modes';
import { decodeTypeform } from '@interpreter/typeform';
import { interpreterLogger as logger } from '@core/utils/logger';

const OPTION_NAMES = ['xfail', 'mode', 'typeform', 'cursorPos', 'brlCursorPos'] as const;

type OptionName = (typeof OPTION_NAMES)[number];

const XFAIL_TRUE_VALUES: ReadonlySet<string> = new Set(['Y', 'true', 'Yes', 'ON']);

function isOptionName(name: string): name is OptionName {
  return OPTION_NAMES.some(option => option === name);
}

/**
 * Decode a test case's options mapping. The opening mapping-start has
 * already been consumed; this returns after the matching mapping-end.
 */
export function readOptions(reader: EventReader): TestOptions {
  const options = defaultTestOptions();

  for (;;) {
    const name = reader.take((event): OptionName | null => {
      if (event.type === 'mapping-end') {
        return null;
      }
      if (event.type !== 'scalar') {
        throw reader.mismatch('mapping-end', event);
      }
      if (!isOptionName(event.value)) {
        throw reader.violation(`Unsupported option ${event.value}`, event);
      }
      return event.value;
    }, 'mapping-end');

    if (name === null) {
      return options;
    }

    switch (name) {
      case 'xfail':
        options.xfail = XFAIL_TRUE_VALUES.has(reader.expectScalar().value);
        break;
      case 'mode':
        options.mode = readModes(reader);
        break;
      case 'typeform':
        options.typeform = readTypeform(reader, reader.expectScalar());
        break;
      case 'cursorPos':
      case 'brlCursorPos': {
        const position = parsePosition(name, reader.expectScalar());
        if (position !== undefined) {
          options[name] = position;
        }
        break;
      }
    }
  }
}

/**
 * Decode `mode: [name, ...]` into a bitmask.
 *
 * An unknown name ends the list early; the event after it must then close
 * the sequence.
 */
function readModes(reader: EventReader): number {
  reader.expect('sequence-start');

  let mask = 0;
  for (;;) {
    const step = reader.take((event): 'continue' | 'closed' | 'stopped' => {
      if (event.type === 'sequence-end') {
        return 'closed';
      }
      if (event.type !== 'scalar') {
        throw reader.mismatch('sequence-end', event);
      }
      if (!isTranslationModeName(event.value)) {
        logger.warn(`Ignoring unknown translation mode '${event.value}' and the rest of the list`, {
          file: reader.filePath,
          line: event.line
        });
        return 'stopped';
      }
      mask |= TRANSLATION_MODES[event.value];
      return 'continue';
    }, 'sequence-end');

    if (step === 'closed') {
      return mask;
    }
    if (step === 'stopped') {
      reader.expect('sequence-end');
      return mask;
    }
  }
}

function readTypeform(reader: EventReader, scalar: ScalarValue): number[] {
  const result = decodeTypeform(scalar.value);
  if (!result.ok) {
    throw reader.violation(`invalid typeform character '${result.character}'`, scalar);
  }
  return result.typeform;
}

function parsePosition(name: OptionName, scalar: ScalarValue): number | undefined {
  const text = scalar.value.trim();
  if (/^-?\d+$/.test(text)) {
    return Number.parseInt(text, 10);
  }
  logger.warn(`Ignoring non-integer ${name} '${scalar.value}'`, { line: scalar.line });
  return undefined;
}
