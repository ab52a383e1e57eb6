import * as child_process from 'child_process';
import type { TranslationVerifier, VerificationRequest } from '@core/types/harness';
import type { ResolvedTranslatorConfig } from '@core/config/types';
import { DEFAULT_CONFIG } from '@core/config/types';
import { describeMode } from '@interpreter/modes';
import { verifierLogger as logger } from '@core/utils/logger';

export interface SpawnOptions {
  input: string;
  encoding: 'utf8';
  env: NodeJS.ProcessEnv;
  timeout: number;
}

export interface SpawnOutcome {
  status: number | null;
  signal?: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => SpawnOutcome;

const defaultSpawn: SpawnFunction = (command, args, options) =>
  child_process.spawnSync(command, args, { ...options, stdio: ['pipe', 'pipe', 'pipe'] });

export interface CommandTranslationVerifierOptions {
  translator?: ResolvedTranslatorConfig;
  print?: (line: string) => void;
  spawn?: SpawnFunction;
  /** Base environment for the translator process */
  env?: NodeJS.ProcessEnv;
}

type TranslationAttempt = { ok: true; output: string } | { ok: false; reason: string };

/**
 * Verifies translations by running an external translator once per case.
 *
 * The word goes to the translator's stdin and the table list is its last
 * argument. Output is compared after trailing newlines are removed.
 */
export class CommandTranslationVerifier implements TranslationVerifier {
  private readonly translator: ResolvedTranslatorConfig;
  private readonly print: (line: string) => void;
  private readonly spawn: SpawnFunction;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: CommandTranslationVerifierOptions = {}) {
    this.translator = options.translator ?? DEFAULT_CONFIG.translator;
    this.print = options.print ?? (line => console.log(line));
    this.spawn = options.spawn ?? defaultSpawn;

    const env = { ...(options.env ?? process.env) };
    if (this.translator.tablePath) {
      env.LOUIS_TABLEPATH = this.translator.tablePath;
    }
    this.env = env;
  }

  verify(request: VerificationRequest): boolean {
    this.warnUnsupported(request);

    const attempt = this.translate(request.tables, request.word);
    if (!attempt.ok) {
      this.print(`Translation failed: ${attempt.reason}`);
      return false;
    }

    if (attempt.output === request.expected) {
      return true;
    }

    this.print(`Input:    '${request.word}'`);
    this.print(`Expected: '${request.expected}'`);
    this.print(`Received: '${attempt.output}'`);
    return false;
  }

  private translate(tables: string, word: string): TranslationAttempt {
    const { command, args, timeout } = this.translator;
    logger.debug('Running translator', { command, args, tables });

    const result = this.spawn(command, [...args, tables], {
      input: `${word}\n`,
      encoding: 'utf8',
      env: this.env,
      timeout
    });

    if (result.error) {
      return { ok: false, reason: result.error.message };
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim();
      const exit = result.status === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.status}`;
      return { ok: false, reason: detail ? `${command} ${exit}: ${detail}` : `${command} ${exit}` };
    }
    return { ok: true, output: result.stdout.replace(/[\r\n]+$/, '') };
  }

  private warnUnsupported(request: VerificationRequest): void {
    if (request.mode !== 0) {
      logger.warn(`Translator command cannot apply modes: ${describeMode(request.mode).join(', ')}`, {
        word: request.word
      });
    }
    if (request.typeform && request.typeform.length > 0) {
      logger.warn('Translator command cannot apply typeform', { word: request.word });
    }
    if (request.cursorPos !== undefined || request.brlCursorPos !== undefined) {
      logger.warn('Translator command cannot report cursor positions', {
        word: request.word,
        cursorPos: request.cursorPos,
        brlCursorPos: request.brlCursorPos
      });
    }
  }
}
