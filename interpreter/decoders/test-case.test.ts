import { describe, it, expect } from 'vitest';
import { ScriptedEventSource, ev, type ScriptedItem } from '@tests/utils/ScriptedEventSource';
import { createTestContext } from '@tests/utils/context';
import { violationOf } from '@tests/utils/violation';
import { EventReader } from '@interpreter/grammar/EventReader';
import { readTest } from './test-case';

// Scripts start just after the case's opening sequence-start
function setup(script: ScriptedItem[]) {
  const source = new ScriptedEventSource(script);
  const harness = createTestContext();
  const reader = new EventReader(source, 'doc.yaml');
  return { source, ...harness, run: () => readTest(reader, harness.context, 'en-us-g2.ctb') };
}

describe('readTest', () => {
  it('verifies a case without options using the defaults', () => {
    const { run, verifier, context } = setup(['hello', '⠓⠑⠇⠇⠕', ev.seqEnd()]);

    const outcome = run();

    expect(verifier.requests).toEqual([
      { tables: 'en-us-g2.ctb', word: 'hello', expected: '⠓⠑⠇⠇⠕', mode: 0 }
    ]);
    expect(outcome).toEqual({
      testCase: { word: 'hello', expected: '⠓⠑⠇⠇⠕', options: { xfail: false, mode: 0 } },
      matched: true,
      failed: false
    });
    expect(context.summary).toEqual({ total: 1, failures: 0 });
  });

  it('passes decoded options to the verifier', () => {
    const { run, verifier } = setup([
      'abc', 'x',
      ev.mapStart(),
      'mode', ev.seqStart(), 'dotsIO', ev.seqEnd(),
      'typeform', '012',
      'cursorPos', '1',
      ev.mapEnd(),
      ev.seqEnd()
    ]);

    run();

    expect(verifier.requests).toEqual([
      { tables: 'en-us-g2.ctb', word: 'abc', expected: 'x', mode: 4, typeform: [0, 1, 2], cursorPos: 1 }
    ]);
  });

  it('counts a mismatch as a failure', () => {
    const { run, context } = setup(['hello', 'WRONG', ev.seqEnd()]);

    expect(run()).toMatchObject({ matched: false, failed: true });
    expect(context.summary).toEqual({ total: 1, failures: 1 });
  });

  it('counts an expected failure that does not match as a pass', () => {
    const { run, context, lines } = setup(['hello', 'WRONG', ev.mapStart(), 'xfail', 'Y', ev.mapEnd(), ev.seqEnd()]);

    expect(run()).toMatchObject({ matched: false, failed: false });
    expect(context.summary).toEqual({ total: 1, failures: 0 });
    expect(lines).toEqual([]);
  });

  it('reports an expected failure that matched', () => {
    const { run, context, lines } = setup(['hello', 'ok', ev.mapStart(), 'xfail', 'true', ev.mapEnd(), ev.seqEnd()]);

    expect(run()).toMatchObject({ matched: true, failed: true });
    expect(context.summary).toEqual({ total: 1, failures: 1 });
    expect(lines).toEqual(["Failure expected but translation matched: 'hello'"]);
  });

  it('requires a scalar word', () => {
    const { run } = setup([ev.mapStart()]);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:0: error: Word expected');
  });

  it('requires a scalar translation', () => {
    const { run } = setup(['hello', ev.seqStart()]);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:1: error: Translation expected');
  });

  it('rejects anything but options or the closing sequence after the translation', () => {
    const { run, verifier, source } = setup(['hello', 'world', 'extra', ev.seqEnd()]);

    expect(violationOf(run).toDiagnostic()).toBe('doc.yaml:2: error: Unexpected event');
    expect(verifier.requests).toEqual([]);
    expect(source.outstanding).toBe(0);
  });

  it('requires the case to close after its options', () => {
    const { run } = setup(['hello', 'world', ev.mapStart(), ev.mapEnd(), 'extra']);

    expect(violationOf(run).message).toBe('expected sequence-end (actual scalar)');
  });

  it('never verifies a case with an unsupported option', () => {
    const { run, verifier, context } = setup(['hello', 'world', ev.mapStart(), 'bogus', 'x', ev.mapEnd(), ev.seqEnd()]);

    expect(violationOf(run).message).toBe('Unsupported option bogus');
    expect(verifier.requests).toEqual([]);
    expect(context.summary).toEqual({ total: 0, failures: 0 });
  });
});
