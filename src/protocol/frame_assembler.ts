/**
 * protocol/frame_assembler.ts
 *
 * Joins text/continuation fragments into one logical message, bounded by
 * maxMessageBytes. Anything else is a protocol violation.
 */

import { ProtocolViolationError } from '../core/errors';
import { TransportFrame } from './transport';

export class FrameAssembler {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly maxMessageBytes: number) {}

  /**
   * Adds a fragment. Returns the complete message text once the final
   * fragment arrives, otherwise null.
   */
  push(frame: TransportFrame): string | null {
    if (frame.kind !== 'text' && frame.kind !== 'continuation') {
      this.reset();
      throw new ProtocolViolationError('Unexpected frame kind', { kind: frame.kind });
    }

    const nextSize = this.size + frame.data.length;
    if (nextSize > this.maxMessageBytes) {
      this.reset();
      throw new ProtocolViolationError('Message exceeds size bound', {
        size: nextSize,
        limit: this.maxMessageBytes
      });
    }

    if (frame.data.length > 0) {
      this.chunks.push(frame.data);
      this.size = nextSize;
    }

    if (!frame.final) return null;

    const text = Buffer.concat(this.chunks, this.size).toString('utf-8');
    this.reset();
    return text;
  }

  /** Bytes buffered for the message in progress. */
  get buffered(): number {
    return this.size;
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }
}
