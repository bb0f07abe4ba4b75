/**
 * JSON ARRAY STREAM
 * =================
 *
 * Adapts an ordered async source (a server-streaming RPC) into a Readable
 * whose concatenated chunks form one JSON array:
 *
 *   [  item0  ,item1  ,item2  ]
 *
 * - One source item in flight at a time; fragments keep source order.
 * - Object-mode buffer of `highWaterMark` fragments. A full buffer suspends
 *   pulling until the HTTP writer drains it.
 * - A serializer failure replaces that item with an error marker object, so
 *   the array stays parseable.
 * - A source failure after the first fragment destroys the stream without
 *   `]`. The body is truncated and fails any JSON parser.
 * - Destroying the stream (client disconnect) aborts the source and returns it.
 *
 * `open()` awaits the first source result before the stream exists, so a
 * backend that fails immediately is reported as a normal error response.
 */

import { Readable } from 'node:stream';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** Item -> JSON text; throws when the item cannot be represented */
export type Serializer<T> = (item: T) => string;

export interface JsonArrayStreamOptions {
  /** Buffer capacity in fragments */
  highWaterMark?: number;
  /** Aborted when the stream is destroyed before the source is exhausted */
  abortController?: AbortController;
  logger?: Logger;
  /** Shows up in logs, e.g. the rpc name */
  label?: string;
}

export interface SerializationErrorMarker {
  error: {
    code: 'SERIALIZATION_ERROR';
    message: string;
  };
}

export const DEFAULT_STREAM_BUFFER = 100;

export function serializationErrorMarker(err: unknown): string {
  const marker: SerializationErrorMarker = {
    error: { code: 'SERIALIZATION_ERROR', message: errorMessage(err) },
  };
  return JSON.stringify(marker);
}

// ═══════════════════════════════════════════════════════════════
// STREAM
// ═══════════════════════════════════════════════════════════════

export class JsonArrayStream<T> extends Readable {
  private readonly source: AsyncIterator<T, unknown, undefined>;
  private readonly serialize: Serializer<T>;
  private readonly options: JsonArrayStreamOptions;

  private primed: IteratorResult<T, unknown> | null;
  private opened = false;
  private pulling = false;
  // a read request that arrived while a pull was in flight
  private wanted = false;
  private exhausted = false;
  private emitted = 0;
  private failed = 0;

  /**
   * Pull the first result, then wrap the source.
   * Rejects with the source's error when the very first pull fails.
   */
  static async open<T>(
    source: AsyncIterator<T, unknown, undefined>,
    serialize: Serializer<T>,
    options: JsonArrayStreamOptions = {},
  ): Promise<JsonArrayStream<T>> {
    const first = await source.next();
    return new JsonArrayStream(source, serialize, options, first);
  }

  constructor(
    source: AsyncIterator<T, unknown, undefined>,
    serialize: Serializer<T>,
    options: JsonArrayStreamOptions = {},
    first: IteratorResult<T, unknown> | null = null,
  ) {
    super({ objectMode: true, highWaterMark: options.highWaterMark ?? DEFAULT_STREAM_BUFFER });
    this.source = source;
    this.serialize = serialize;
    this.options = options;
    this.primed = first;
  }

  /** Items written so far, error markers included */
  get itemCount(): number {
    return this.emitted;
  }

  /** Items replaced by an error marker */
  get failedCount(): number {
    return this.failed;
  }

  override _read(): void {
    if (this.exhausted) {
      return;
    }
    if (this.pulling) {
      this.wanted = true;
      return;
    }
    this.pulling = true;
    this.wanted = false;
    this.pump().then(
      () => {
        this.pulling = false;
        if (this.wanted && !this.destroyed) {
          this._read();
        }
      },
      (err: unknown) => {
        this.pulling = false;
        this.wanted = false;
        this.abortSource(err);
      },
    );
  }

  override _destroy(err: Error | null, callback: (error?: Error | null) => void): void {
    if (this.exhausted) {
      callback(err);
      return;
    }
    this.exhausted = true;
    this.options.abortController?.abort();
    const returning = this.source.return?.();
    if (!returning) {
      callback(err);
      return;
    }
    returning.then(
      () => callback(err),
      (returnErr: unknown) => {
        this.options.logger?.debug?.(
          { label: this.options.label, err: errorMessage(returnErr) },
          'source cleanup after destroy failed',
        );
        callback(err);
      },
    );
  }

  private async pump(): Promise<void> {
    if (!this.opened) {
      this.opened = true;
      if (!this.push('[')) {
        return;
      }
    }

    for (;;) {
      const next = this.primed ?? (await this.source.next());
      this.primed = null;
      if (this.destroyed) {
        return;
      }
      if (next.done) {
        this.exhausted = true;
        this.push(']');
        this.push(null);
        this.options.logger?.debug?.(
          { label: this.options.label, items: this.emitted, failed: this.failed },
          'json array stream completed',
        );
        return;
      }

      const fragment = this.fragment(next.value);
      const separator = this.emitted > 0 ? ',' : '';
      this.emitted += 1;
      if (!this.push(separator + fragment)) {
        return;
      }
    }
  }

  private fragment(item: T): string {
    try {
      return this.serialize(item);
    } catch (err) {
      this.failed += 1;
      this.options.logger?.warn(
        { label: this.options.label, position: this.emitted, err: errorMessage(err) },
        'stream item serialization failed',
      );
      return serializationErrorMarker(err);
    }
  }

  private abortSource(err: unknown): void {
    // a rejection caused by our own abort is not a source failure
    if (this.destroyed) {
      return;
    }
    this.exhausted = true;
    this.options.logger?.error(
      { label: this.options.label, items: this.emitted, err: errorMessage(err) },
      'source failed mid-stream; response truncated',
    );
    this.destroy(err instanceof Error ? err : new Error(errorMessage(err)));
  }
}
