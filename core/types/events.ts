/**
 * Event model for the document stream consumed by the interpreter.
 *
 * Events follow the order a YAML emitter-style parser produces them: one
 * stream, one or more documents, and nested mapping/sequence blocks whose
 * leaves are scalars. Every event records the 0-based line index where it
 * starts so diagnostics can point back into the source.
 */

export type ParserEventType =
  | 'stream-start'
  | 'stream-end'
  | 'document-start'
  | 'document-end'
  | 'mapping-start'
  | 'mapping-end'
  | 'sequence-start'
  | 'sequence-end'
  | 'scalar'
  | 'alias';

export type StreamEncoding = 'UTF-8' | 'UTF-16LE' | 'UTF-16BE';

interface EventBase {
  /** 0-based line index of the event start */
  readonly line: number;
}

export interface StreamStartEvent extends EventBase {
  readonly type: 'stream-start';
  readonly encoding: StreamEncoding;
}

export interface StreamEndEvent extends EventBase {
  readonly type: 'stream-end';
}

export interface DocumentStartEvent extends EventBase {
  readonly type: 'document-start';
}

export interface DocumentEndEvent extends EventBase {
  readonly type: 'document-end';
}

export interface MappingStartEvent extends EventBase {
  readonly type: 'mapping-start';
}

export interface MappingEndEvent extends EventBase {
  readonly type: 'mapping-end';
}

export interface SequenceStartEvent extends EventBase {
  readonly type: 'sequence-start';
}

export interface SequenceEndEvent extends EventBase {
  readonly type: 'sequence-end';
}

export interface ScalarEvent extends EventBase {
  readonly type: 'scalar';
  readonly value: string;
  /** UTF-8 byte length of `value` */
  readonly length: number;
}

export interface AliasEvent extends EventBase {
  readonly type: 'alias';
  readonly anchor: string;
}

export type ParserEvent =
  | StreamStartEvent
  | StreamEndEvent
  | DocumentStartEvent
  | DocumentEndEvent
  | MappingStartEvent
  | MappingEndEvent
  | SequenceStartEvent
  | SequenceEndEvent
  | ScalarEvent
  | AliasEvent;

/**
 * Result of a single pull from an event source.
 */
export type PullResult =
  | { status: 'event'; event: ParserEvent }
  | { status: 'end' }
  | { status: 'error'; message: string; line: number };

/**
 * Forward-only producer of parser events.
 *
 * A consumer may hold at most one event at a time and must hand it back via
 * `release` before pulling the next one.
 */
export interface EventSource {
  next(): PullResult;
  release(event: ParserEvent): void;
}

/**
 * Build a scalar event, computing its byte length.
 */
export function scalarEvent(value: string, line: number): ScalarEvent {
  return { type: 'scalar', value, length: Buffer.byteLength(value, 'utf8'), line };
}
