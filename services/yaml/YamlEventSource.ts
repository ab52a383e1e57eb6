import {
  Composer,
  LineCounter,
  Parser,
  isAlias,
  isMap,
  isPair,
  isScalar,
  isSeq,
  type YAMLError
} from 'yaml';
import {
  scalarEvent,
  type EventSource,
  type ParserEvent,
  type ParserEventType,
  type PullResult,
  type StreamEncoding
} from '@core/types/events';
import { parserLogger } from '@core/utils/logger';

const DECODER_LABELS: Record<StreamEncoding, string> = {
  'UTF-8': 'utf-8',
  'UTF-16LE': 'utf-16le',
  'UTF-16BE': 'utf-16be'
};

/**
 * Detect the stream encoding from its byte-order mark.
 */
export function detectEncoding(bytes: Uint8Array): StreamEncoding {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'UTF-16LE';
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'UTF-16BE';
  }
  return 'UTF-8';
}

/**
 * Decode raw document bytes, dropping any byte-order mark.
 */
export function decodeDocument(bytes: Uint8Array): { text: string; encoding: StreamEncoding } {
  const encoding = detectEncoding(bytes);
  const text = new TextDecoder(DECODER_LABELS[encoding]).decode(bytes);
  return { text, encoding };
}

function scalarText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return value === null || value === undefined ? '' : String(value);
}

/** [start, valueEnd, nodeEnd] offsets as reported by the composer */
type NodeRange = readonly [number, number, number];

function rangeOf(node: unknown): NodeRange | undefined {
  if (isScalar(node) || isAlias(node) || isMap(node) || isSeq(node)) {
    return node.range ?? undefined;
  }
  return undefined;
}

interface ComposedDocument {
  range: NodeRange;
  contents: unknown;
}

/** Event types that carry nothing beyond their line */
type BareEventType = Exclude<ParserEventType, 'scalar' | 'alias' | 'stream-start'>;

interface PositionedEvent {
  event: ParserEvent;
  /** Source offset where the event starts */
  offset: number;
}

function earliestError(errors: readonly YAMLError[]): YAMLError | undefined {
  let earliest: YAMLError | undefined;
  for (const error of errors) {
    if (!earliest || error.pos[0] < earliest.pos[0]) {
      earliest = error;
    }
  }
  return earliest;
}

/**
 * Pull-based event source over YAML text.
 *
 * Documents are composed one at a time with the failsafe schema, so every
 * scalar arrives as its literal text. Each composed document is then walked
 * lazily and flattened into start/end/scalar events in document order. When a
 * document has errors, its events up to the first one are delivered before
 * the error itself.
 */
export class YamlEventSource implements EventSource {
  private readonly lineCounter = new LineCounter();
  private readonly items: Iterator<PullResult>;
  private held: ParserEvent | null = null;
  private finished = false;

  constructor(
    private readonly text: string,
    private readonly encoding: StreamEncoding = 'UTF-8'
  ) {
    this.items = this.stream();
  }

  next(): PullResult {
    if (this.held) {
      throw new Error(`Event source pulled while a ${this.held.type} event is still held`);
    }
    if (this.finished) {
      return { status: 'end' };
    }

    const item = this.items.next();
    if (item.done) {
      this.finished = true;
      return { status: 'end' };
    }

    const result = item.value;
    if (result.status === 'event') {
      this.held = result.event;
    } else {
      // Nothing is produced after a composition error
      this.finished = true;
    }
    return result;
  }

  release(event: ParserEvent): void {
    if (this.held !== event) {
      throw new Error(`Released a ${event.type} event that is not held`);
    }
    this.held = null;
  }

  private lineAt(offset: number): number {
    return this.lineCounter.linePos(offset).line - 1;
  }

  private emit(event: ParserEvent): PullResult {
    return { status: 'event', event };
  }

  private *stream(): Generator<PullResult> {
    yield this.emit({ type: 'stream-start', encoding: this.encoding, line: 0 });

    const parser = new Parser(this.lineCounter.addNewLine);
    // Repeated keys are legal at the event level; the consumer decides
    const composer = new Composer({ schema: 'failsafe', uniqueKeys: false });

    for (const doc of composer.compose(parser.parse(this.text))) {
      for (const warning of doc.warnings) {
        parserLogger.warn(warning.message, { line: this.lineAt(warning.pos[0]) });
      }

      // Events that start before the earliest error are still delivered
      const error = earliestError(doc.errors);
      const limit = error ? error.pos[0] : Number.POSITIVE_INFINITY;
      for (const item of this.document(doc)) {
        if (item.offset >= limit) {
          break;
        }
        yield this.emit(item.event);
      }

      if (error) {
        parserLogger.debug('YAML composition failed', { code: error.code, offset: error.pos[0] });
        yield { status: 'error', message: error.message, line: this.lineAt(error.pos[0]) };
        return;
      }
    }

    yield this.emit({ type: 'stream-end', line: this.lineAt(this.text.length) });
  }

  private *document(doc: ComposedDocument): Generator<PositionedEvent> {
    const [start, , end] = doc.range;
    yield this.at('document-start', start);
    yield* this.node(doc.contents, start);
    yield this.at('document-end', end);
  }

  private at(type: BareEventType, offset: number): PositionedEvent {
    return { event: { type, line: this.lineAt(offset) }, offset };
  }

  /**
   * Flatten one node. Missing nodes (empty values) become empty scalars
   * positioned at `fallbackOffset`.
   */
  private *node(node: unknown, fallbackOffset: number): Generator<PositionedEvent> {
    const range = rangeOf(node);
    const start = range ? range[0] : fallbackOffset;
    const end = range ? range[1] : fallbackOffset;

    if (isScalar(node)) {
      yield { event: scalarEvent(scalarText(node.value), this.lineAt(start)), offset: start };
      return;
    }

    if (isAlias(node)) {
      yield { event: { type: 'alias', anchor: node.source, line: this.lineAt(start) }, offset: start };
      return;
    }

    if (isMap(node)) {
      yield this.at('mapping-start', start);
      for (const pair of node.items) {
        yield* this.pair(pair.key, pair.value, start);
      }
      yield this.at('mapping-end', end);
      return;
    }

    if (isSeq(node)) {
      yield this.at('sequence-start', start);
      for (const item of node.items) {
        if (isPair(item)) {
          // `[a: b]` holds a single-pair mapping
          const pairStart = rangeOf(item.key)?.[0] ?? start;
          yield this.at('mapping-start', pairStart);
          yield* this.pair(item.key, item.value, pairStart);
          yield this.at('mapping-end', rangeOf(item.value)?.[1] ?? pairStart);
        } else {
          yield* this.node(item, start);
        }
      }
      yield this.at('sequence-end', end);
      return;
    }

    yield { event: scalarEvent('', this.lineAt(start)), offset: start };
  }

  private *pair(key: unknown, value: unknown, fallbackOffset: number): Generator<PositionedEvent> {
    yield* this.node(key, fallbackOffset);
    yield* this.node(value, rangeOf(key)?.[1] ?? fallbackOffset);
  }
}
