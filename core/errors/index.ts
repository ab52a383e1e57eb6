/**
 * Central export point for checker error types.
 */

export { CheckError, ErrorSeverity } from './CheckError';
export type { BaseErrorDetails, CheckErrorOptions } from './CheckError';
export { GrammarViolation } from './GrammarViolation';
export type { GrammarViolationOptions } from './GrammarViolation';
export { ConfigurationError } from './ConfigurationError';
