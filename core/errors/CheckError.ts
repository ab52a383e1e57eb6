/**
 * Defines the severity levels for checker errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

import type { SourceLocation } from '@core/types';
import { formatLocationForError } from '@core/utils/locationFormatter';

/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a CheckError instance.
 */
export interface CheckErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  sourceLocation?: SourceLocation;
  cause?: unknown;
}

/**
 * Base class for all custom checker errors.
 * Provides structure for error codes, severity, details, and source location.
 */
export class CheckError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source location where the error occurred */
  public readonly sourceLocation?: SourceLocation;

  constructor(message: string, options: CheckErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.sourceLocation = options.sourceLocation;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.sourceLocation) {
      result += ` at ${formatLocationForError(this.sourceLocation)}`;
    }

    result += ` (Severity: ${this.severity})`;
    return result;
  }

  /**
   * Serializes the error to JSON with formatted location string.
   */
  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.sourceLocation) {
      result.sourceLocation = formatLocationForError(this.sourceLocation);
    }

    return result;
  }
}
