import { describe, it, expect } from 'vitest';
import { ScriptedEventSource, ev, type ScriptedItem } from '@tests/utils/ScriptedEventSource';
import { createTestContext } from '@tests/utils/context';
import { violationOf } from '@tests/utils/violation';
import { EventReader } from '@interpreter/grammar/EventReader';
import { readTables } from './tables';

function decode(script: ScriptedItem[], maxTableListBytes?: number) {
  const source = new ScriptedEventSource(script);
  const { context } = createTestContext({ limits: { maxTableListBytes } });
  const reader = new EventReader(source, 'doc.yaml');
  return { source, run: () => readTables(reader, context) };
}

describe('readTables', () => {
  it('joins table names with single commas', () => {
    const { run } = decode(['tables', ev.seqStart(), 'a', 'b', 'c', ev.seqEnd()]);

    expect(run()).toBe('a,b,c');
  });

  it('returns an empty list for an empty sequence', () => {
    const { run } = decode(['tables', ev.seqStart(), ev.seqEnd()]);

    expect(run()).toBe('');
  });

  it('requires the tables keyword first', () => {
    const { run } = decode(['tests', ev.seqStart()]);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:0: error: tables expected');
  });

  it('requires a sequence of names', () => {
    const { run } = decode(['tables', 'a']);

    expect(violationOf(run).message).toBe('expected sequence-start (actual scalar)');
  });

  it('rejects non-scalar entries', () => {
    const { run, source } = decode(['tables', ev.seqStart(), 'a', ev.mapStart(), ev.mapEnd(), ev.seqEnd()]);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:3: error: expected scalar (actual mapping-start)');
    expect(source.outstanding).toBe(0);
    expect(source.remaining).toBe(2);
  });

  it('rejects names containing a comma', () => {
    const { run } = decode(['tables', ev.seqStart(), 'a,b', ev.seqEnd()]);

    expect(violationOf(run).message).toBe("table name must not contain ',': a,b");
  });

  it('accepts a list that exactly fills the capacity', () => {
    const { run } = decode(['tables', ev.seqStart(), 'ab', 'cd', ev.seqEnd()], 5);

    expect(run()).toBe('ab,cd');
  });

  it('rejects a list over the capacity at the overflowing name', () => {
    const { run } = decode(['tables', ev.seqStart(), 'abc', 'def', ev.seqEnd()], 5);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:3: error: table list exceeds 5 bytes');
  });

  it('measures capacity in UTF-8 bytes', () => {
    const { run } = decode(['tables', ev.seqStart(), 'ü', 'ü', ev.seqEnd()], 4);

    expect(violationOf(run).message).toBe('table list exceeds 4 bytes');
  });
});
