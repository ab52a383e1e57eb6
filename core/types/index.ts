/**
 * Core types shared by the interpreter, services and CLI.
 */

export * from './events';
export * from './harness';

// =========================================================================
// COMMON TYPES
// =========================================================================

/**
 * Source location used by error reporting.
 */
export interface SourceLocation {
  /** The file path where this location occurs */
  filePath?: string;
  /** Line index (0-based), matching the event stream's positions */
  line?: number;
  /** Column number, when the producer knows it */
  column?: number;
}
