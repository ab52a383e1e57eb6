import { describe, it, expect } from 'vitest';
import { formatLocation, formatLocationForError } from './locationFormatter';

describe('formatLocation', () => {
  it('joins file, line and column', () => {
    expect(formatLocationForError({ filePath: 'a.yaml', line: 0 })).toBe('a.yaml:0');
    expect(formatLocationForError({ filePath: 'a.yaml', line: 3, column: 7 })).toBe('a.yaml:3:7');
    expect(formatLocationForError({ filePath: 'a.yaml' })).toBe('a.yaml');
  });

  it('falls back to line wording without a file', () => {
    expect(formatLocation({ line: 2 })).toEqual({ display: 'line 2', line: 2, column: undefined });
    expect(formatLocationForError({ line: 2, column: 1 })).toBe('line 2, column 1');
  });

  it('handles missing locations', () => {
    expect(formatLocationForError(undefined)).toBe('unknown location');
    expect(formatLocationForError({})).toBe('unknown location');
  });
});
