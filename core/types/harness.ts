/**
 * Test harness data model.
 */

/**
 * Per-case settings decoded from the optional options mapping.
 */
export interface TestOptions {
  /** The case is expected to produce a translation mismatch */
  xfail: boolean;
  /** Bitwise OR of translation mode constants */
  mode: number;
  /** Per-character style values */
  typeform?: number[];
  cursorPos?: number;
  brlCursorPos?: number;
}

export interface TestCase {
  word: string;
  expected: string;
  options: TestOptions;
}

export interface TestOutcome {
  testCase: TestCase;
  /** Result reported by the verifier */
  matched: boolean;
  /** The xfail expectation disagreed with `matched` */
  failed: boolean;
}

export interface RunSummary {
  total: number;
  failures: number;
}

/** Comma-joined table names */
export type TableList = string;

export type FlagSet = ReadonlySet<string>;

export interface VerificationRequest {
  tables: TableList;
  word: string;
  typeform?: readonly number[];
  expected: string;
  mode: number;
  cursorPos?: number;
  brlCursorPos?: number;
}

/**
 * Black-box judge of a single translation. Returns true when the produced
 * translation equals the expected one.
 */
export interface TranslationVerifier {
  verify(request: VerificationRequest): boolean;
}

export function defaultTestOptions(): TestOptions {
  return { xfail: false, mode: 0 };
}
