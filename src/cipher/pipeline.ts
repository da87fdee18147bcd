/**
 * Pipelined transform
 *
 * A producer fills a bounded queue with keystream blocks while the consumer
 * XORs incoming message chunks against it. Only scheduling changes: the
 * keystream is still computed one step at a time, in order.
 *
 * The generator handed to the queue is consumed by it (the producer runs
 * ahead of the consumer by up to depth * blockSize symbols).
 */
import { PIPELINE } from '../utils/constants.js';
import { nextTick } from '../utils/helpers.js';
import type { SymbolSource } from '../keystream/generator.js';
import { validateMessage, type Message } from './transform.js';

export interface PipelineOptions {
  blockSize?: number;
  queueDepth?: number;
  // Checked once per chunk
  signal?: AbortSignal;
}

/**
 * Bounded FIFO of keystream blocks with a single background producer
 */
export class KeystreamQueue {
  private readonly source: SymbolSource;
  private readonly blockSize: number;
  private readonly depth: number;
  private readonly blocks: Uint8Array[] = [];
  private readOffset = 0;
  private closed = false;
  private failure: unknown = null;
  private dataWaiter: (() => void) | null = null;
  private spaceWaiter: (() => void) | null = null;
  private readonly producer: Promise<void>;

  constructor(source: SymbolSource, blockSize: number = PIPELINE.BLOCK_SIZE, depth: number = PIPELINE.QUEUE_DEPTH) {
    if (!Number.isInteger(blockSize) || blockSize <= 0 || !Number.isInteger(depth) || depth <= 0) {
      throw new RangeError(`Invalid pipeline geometry: blockSize=${blockSize}, depth=${depth}`);
    }
    this.source = source;
    this.blockSize = blockSize;
    this.depth = depth;
    this.producer = this.produce();
  }

  /** Blocks currently buffered */
  get buffered(): number {
    return this.blocks.length;
  }

  /**
   * Next `count` keystream symbols, in order
   */
  async take(count: number): Promise<Uint8Array> {
    const out = new Uint8Array(count);
    let filled = 0;

    while (filled < count) {
      if (this.failure !== null) throw this.failure;
      if (this.blocks.length === 0) {
        if (this.closed) throw new Error('Keystream queue is closed');
        await new Promise<void>(resolve => { this.dataWaiter = resolve; });
        continue;
      }

      const head = this.blocks[0];
      const n = Math.min(count - filled, head.length - this.readOffset);
      out.set(head.subarray(this.readOffset, this.readOffset + n), filled);
      filled += n;
      this.readOffset += n;

      if (this.readOffset === head.length) {
        this.blocks.shift();
        this.readOffset = 0;
        this.wakeProducer();
      }
    }

    return out;
  }

  /**
   * Stop the producer and wait for it to exit
   */
  async close(): Promise<void> {
    this.closed = true;
    this.wakeProducer();
    this.wakeConsumer();
    await this.producer;
  }

  private async produce(): Promise<void> {
    try {
      while (!this.closed) {
        if (this.blocks.length >= this.depth) {
          await new Promise<void>(resolve => { this.spaceWaiter = resolve; });
          continue;
        }

        const block = new Uint8Array(this.blockSize);
        for (let i = 0; i < block.length; i++) {
          block[i] = this.source.next();
        }
        this.blocks.push(block);
        this.wakeConsumer();

        await nextTick();
      }
    } catch (error) {
      this.failure = error;
      this.wakeConsumer();
    }
  }

  private wakeConsumer(): void {
    const waiter = this.dataWaiter;
    this.dataWaiter = null;
    waiter?.();
  }

  private wakeProducer(): void {
    const waiter = this.spaceWaiter;
    this.spaceWaiter = null;
    waiter?.();
  }
}

/**
 * Transform a stream of message chunks, one output chunk per input chunk.
 * Each chunk is validated whole before any of its keystream is used.
 */
export async function* transformStream(
  chunks: AsyncIterable<Message> | Iterable<Message>,
  generator: SymbolSource,
  options: PipelineOptions = {}
): AsyncGenerator<number[], void, undefined> {
  // Started on the first non-empty chunk, so an empty stream draws no keystream
  let queue: KeystreamQueue | null = null;
  let processed = 0;

  try {
    for await (const chunk of chunks) {
      if (options.signal?.aborted) {
        console.log('[Pipeline] Aborted after', processed, 'symbols');
        throw options.signal.reason;
      }

      validateMessage(chunk);
      if (chunk.length === 0) {
        yield [];
        continue;
      }
      if (queue === null) {
        queue = new KeystreamQueue(generator, options.blockSize, options.queueDepth);
      }
      const keystream = await queue.take(chunk.length);

      const out = new Array<number>(chunk.length);
      for (let i = 0; i < chunk.length; i++) {
        out[i] = chunk[i] ^ keystream[i];
      }
      processed += chunk.length;
      yield out;
    }
  } finally {
    await queue?.close();
  }
}

/**
 * Collect a transformed stream into one message
 */
export async function collect(stream: AsyncIterable<number[]>): Promise<number[]> {
  const result: number[] = [];
  for await (const chunk of stream) {
    result.push(...chunk);
  }
  return result;
}
