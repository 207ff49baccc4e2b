/**
 * AudioSessionBuffer: per-connection accumulator of audio chunks.
 *
 * Chunks are kept as a list and only concatenated on drain, so append is
 * O(1) regardless of how much audio has arrived.
 */
export class AudioSessionBuffer {
  private chunks: Buffer[] = [];
  private length = 0;

  append(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  /**
   * Return everything appended since the last drain and clear the buffer.
   */
  drain(): Buffer {
    const content = Buffer.concat(this.chunks, this.length);
    this.chunks = [];
    this.length = 0;
    return content;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  get byteLength(): number {
    return this.length;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  release(): void {
    this.chunks = [];
    this.length = 0;
  }
}
