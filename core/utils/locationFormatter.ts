import type { SourceLocation } from '@core/types';

export interface FormattedLocation {
  readonly display: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
}

export function formatLocation(location: SourceLocation | undefined): FormattedLocation {
  if (!location) {
    return { display: 'unknown location' };
  }

  if (location.filePath) {
    const parts: string[] = [location.filePath];

    if (location.line !== undefined) {
      parts.push(String(location.line));
      if (location.column !== undefined) {
        parts.push(String(location.column));
      }
    }

    return {
      display: parts.join(':'),
      file: location.filePath,
      line: location.line,
      column: location.column
    };
  }

  if (location.line !== undefined) {
    const display = location.column !== undefined
      ? `line ${location.line}, column ${location.column}`
      : `line ${location.line}`;

    return {
      display,
      line: location.line,
      column: location.column
    };
  }

  return { display: 'unknown location' };
}

export function formatLocationForError(location: SourceLocation | undefined): string {
  return formatLocation(location).display;
}
