/**
 * Accumulates agent PCM for the response window in flight.
 */

export class AudioRecorder {
  private chunks: Buffer[] = [];
  private byteCount = 0;

  /** Add an incoming audio chunk. Empty frames are ignored. */
  push(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.byteCount += chunk.length;
  }

  /** Get the combined audio buffer. */
  getBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.byteCount);
  }

  get size(): number {
    return this.byteCount;
  }

  /** Return everything recorded so far and start over. */
  take(): Buffer {
    const buffer = this.getBuffer();
    this.reset();
    return buffer;
  }

  reset(): void {
    this.chunks = [];
    this.byteCount = 0;
  }
}
