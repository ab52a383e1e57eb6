import type { RunSummary, TranslationVerifier } from '@core/types/harness';
import { DEFAULT_CONFIG } from '@core/config/types';

/**
 * State threaded through every decoder for one document run.
 *
 * The summary is the only mutable part; decoders update it through
 * `recordOutcome` so counting stays in one place.
 */
export interface RunContext {
  /** Path shown in diagnostics */
  readonly filePath: string;
  readonly verifier: TranslationVerifier;
  readonly summary: RunSummary;
  /** Sink for harness output lines */
  readonly print: (line: string) => void;
  readonly limits: RunLimits;
}

export interface RunLimits {
  /** Byte capacity of the joined table list */
  maxTableListBytes: number;
}

export interface RunContextOptions {
  filePath: string;
  verifier: TranslationVerifier;
  print?: (line: string) => void;
  limits?: Partial<RunLimits>;
}

export function createRunContext(options: RunContextOptions): RunContext {
  return {
    filePath: options.filePath,
    verifier: options.verifier,
    summary: { total: 0, failures: 0 },
    print: options.print ?? (line => console.log(line)),
    limits: {
      maxTableListBytes: options.limits?.maxTableListBytes ?? DEFAULT_CONFIG.tables.maxListBytes
    }
  };
}

export function recordOutcome(context: RunContext, failed: boolean): void {
  context.summary.total++;
  if (failed) {
    context.summary.failures++;
  }
}
