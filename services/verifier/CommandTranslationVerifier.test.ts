import { describe, it, expect, vi, afterEach } from 'vitest';
import { verifierLogger } from '@core/utils/logger';
import {
  CommandTranslationVerifier,
  type SpawnFunction,
  type SpawnOutcome
} from './CommandTranslationVerifier';

const request = {
  tables: 'en-us-g2.ctb',
  word: 'hi',
  expected: '⠓⠊',
  mode: 0
};

function fakeSpawn(outcome: Partial<SpawnOutcome>) {
  return vi.fn<Parameters<SpawnFunction>, SpawnOutcome>(() => ({
    status: 0,
    stdout: '',
    stderr: '',
    ...outcome
  }));
}

describe('CommandTranslationVerifier', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the translator with the word on stdin and the tables last', () => {
    const spawn = fakeSpawn({ stdout: '⠓⠊\n' });
    const verifier = new CommandTranslationVerifier({ spawn, print: () => undefined, env: {} });

    expect(verifier.verify(request)).toBe(true);
    expect(spawn).toHaveBeenCalledWith('lou_translate', ['--forward', 'en-us-g2.ctb'], {
      input: 'hi\n',
      encoding: 'utf8',
      env: {},
      timeout: 30000
    });
  });

  it('prints the mismatch report', () => {
    const lines: string[] = [];
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ stdout: '⠓⠑\r\n' }),
      print: line => lines.push(line)
    });

    expect(verifier.verify(request)).toBe(false);
    expect(lines).toEqual(["Input:    'hi'", "Expected: '⠓⠊'", "Received: '⠓⠑'"]);
  });

  it('treats a translator that cannot start as no match', () => {
    const lines: string[] = [];
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ status: null, error: new Error('spawnSync lou_translate ENOENT') }),
      print: line => lines.push(line)
    });

    expect(verifier.verify(request)).toBe(false);
    expect(lines).toEqual(['Translation failed: spawnSync lou_translate ENOENT']);
  });

  it('treats a non-zero exit as no match', () => {
    const lines: string[] = [];
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ status: 3, stderr: 'cannot resolve table\n' }),
      print: line => lines.push(line)
    });

    expect(verifier.verify(request)).toBe(false);
    expect(lines).toEqual(['Translation failed: lou_translate exit code 3: cannot resolve table']);
  });

  it('reports a translator killed by a signal', () => {
    const lines: string[] = [];
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ status: null, signal: 'SIGTERM' }),
      print: line => lines.push(line)
    });

    verifier.verify(request);

    expect(lines).toEqual(['Translation failed: lou_translate signal SIGTERM']);
  });

  it('uses the configured command and table path', () => {
    const spawn = fakeSpawn({ stdout: '⠓⠊' });
    const verifier = new CommandTranslationVerifier({
      translator: { command: './lou', args: [], tablePath: '/opt/tables', timeout: 500 },
      spawn,
      print: () => undefined,
      env: { PATH: '/bin' }
    });

    verifier.verify(request);

    expect(spawn).toHaveBeenCalledWith('./lou', ['en-us-g2.ctb'], {
      input: 'hi\n',
      encoding: 'utf8',
      env: { PATH: '/bin', LOUIS_TABLEPATH: '/opt/tables' },
      timeout: 500
    });
  });

  it('warns about modes and typeform it cannot pass on', () => {
    const warn = vi.spyOn(verifierLogger, 'warn');
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ stdout: '⠓⠊' }),
      print: () => undefined
    });

    verifier.verify({ ...request, mode: 5, typeform: [0, 1] });

    expect(warn).toHaveBeenCalledWith('Translator command cannot apply modes: noContractions, dotsIO', { word: 'hi' });
    expect(warn).toHaveBeenCalledWith('Translator command cannot apply typeform', { word: 'hi' });
  });

  it('warns that cursor positions are not compared', () => {
    const warn = vi.spyOn(verifierLogger, 'warn');
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ stdout: '⠓⠊' }),
      print: () => undefined
    });

    expect(verifier.verify({ ...request, brlCursorPos: 1 })).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Translator command cannot report cursor positions', {
      word: 'hi',
      cursorPos: undefined,
      brlCursorPos: 1
    });
  });

  it('stays quiet for a plain case', () => {
    const warn = vi.spyOn(verifierLogger, 'warn');
    const verifier = new CommandTranslationVerifier({
      spawn: fakeSpawn({ stdout: '⠓⠊' }),
      print: () => undefined
    });

    verifier.verify(request);

    expect(warn).not.toHaveBeenCalled();
  });
});
