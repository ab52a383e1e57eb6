import { describe, it, expect } from 'vitest';
import { ScriptedEventSource, ev } from '@tests/utils/ScriptedEventSource';
import { createTestContext } from '@tests/utils/context';
import { violationOf } from '@tests/utils/violation';
import { EventReader } from '@interpreter/grammar/EventReader';
import { readFlags } from './flags';

describe('readFlags', () => {
  it('prints and collects every scalar in the mapping', () => {
    const { context, lines } = createTestContext();
    const reader = new EventReader(
      new ScriptedEventSource([ev.mapStart(), 'testmode', 'hyphenate', 'strict', 'on', ev.mapEnd()]),
      'doc.yaml'
    );

    const flags = readFlags(reader, context);

    expect(lines).toEqual(['Flag testmode', 'Flag hyphenate', 'Flag strict', 'Flag on']);
    expect([...flags]).toEqual(['testmode', 'hyphenate', 'strict', 'on']);
  });

  it('accepts an empty mapping', () => {
    const { context, lines } = createTestContext();
    const reader = new EventReader(new ScriptedEventSource([ev.mapStart(), ev.mapEnd()]), 'doc.yaml');

    expect(readFlags(reader, context).size).toBe(0);
    expect(lines).toEqual([]);
  });

  it('requires a mapping', () => {
    const { context } = createTestContext();
    const reader = new EventReader(new ScriptedEventSource([ev.seqStart()]), 'doc.yaml');

    expect(violationOf(() => readFlags(reader, context)).message).toBe(
      'expected mapping-start (actual sequence-start)'
    );
  });

  it('rejects nested collections', () => {
    const { context } = createTestContext();
    const source = new ScriptedEventSource([ev.mapStart(), 'mode', ev.seqStart(), ev.seqEnd(), ev.mapEnd()]);
    const reader = new EventReader(source, 'doc.yaml');

    expect(violationOf(() => readFlags(reader, context)).toDiagnostic()).toBe(
      'doc.yaml:2: error: expected scalar (actual sequence-start)'
    );
    expect(source.outstanding).toBe(0);
  });
});
