/**
 * HTTP/1.1 chunked transfer encoding decoder.
 * Decodes chunked body data into raw content.
 *
 * Chunked format:
 *   <hex-size>[;ext]\r\n
 *   <data>\r\n
 *   ...
 *   0\r\n
 *   [trailer-field\r\n]*
 *   \r\n
 */
import { Buffer } from "node:buffer";

const enum ChunkedState {
  READ_SIZE,
  READ_DATA,
  READ_DATA_CRLF,
  READ_TRAILER,
  DONE,
}

const MAX_CHUNK_SIZE = 16 * 1024 * 1024;
const MAX_LINE_LENGTH = 8 * 1024;
const HEX_RE = /^[0-9a-fA-F]+$/;

/**
 * Stateful chunked transfer encoding decoder.
 * Feed raw data via feed(), collect decoded chunks via getChunks().
 * Bytes after the terminating blank line are kept in `remainder`.
 */
export class ChunkedDecoder {
  private state: ChunkedState = ChunkedState.READ_SIZE;
  private buffer: Buffer = Buffer.alloc(0);
  private currentChunkSize = 0;
  private chunks: Buffer[] = [];

  /** Whether the final chunk and trailer section have been received */
  get done(): boolean {
    return this.state === ChunkedState.DONE;
  }

  /** Unconsumed bytes following the end of the chunked body */
  get remainder(): Buffer {
    return this.done ? this.buffer : Buffer.alloc(0);
  }

  /** Feed raw data into the decoder */
  feed(data: Buffer | Uint8Array): void {
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, buf]) : buf;
    this.process();
  }

  /** Get and clear decoded chunks */
  getChunks(): Buffer[] {
    const result = this.chunks;
    this.chunks = [];
    return result;
  }

  private process(): void {
    while (this.buffer.length > 0) {
      switch (this.state) {
        case ChunkedState.READ_SIZE: {
          const line = this.takeLine();
          if (line === null) return; // need more data

          // Chunk size may have extensions after ";", ignore them
          const semiIdx = line.indexOf(";");
          const sizeStr = (semiIdx === -1 ? line : line.substring(0, semiIdx)).trim();
          if (!HEX_RE.test(sizeStr)) {
            throw new Error(`Invalid chunk size: "${sizeStr}"`);
          }
          this.currentChunkSize = parseInt(sizeStr, 16);
          if (this.currentChunkSize > MAX_CHUNK_SIZE) {
            throw new Error(`Chunk size too large: ${this.currentChunkSize}`);
          }

          this.state =
            this.currentChunkSize === 0 ? ChunkedState.READ_TRAILER : ChunkedState.READ_DATA;
          break;
        }

        case ChunkedState.READ_DATA: {
          if (this.buffer.length < this.currentChunkSize) {
            // Hand out what we have so large chunks stream through
            this.chunks.push(this.buffer);
            this.currentChunkSize -= this.buffer.length;
            this.buffer = Buffer.alloc(0);
            return;
          }

          this.chunks.push(this.buffer.subarray(0, this.currentChunkSize));
          this.buffer = this.buffer.subarray(this.currentChunkSize);
          this.state = ChunkedState.READ_DATA_CRLF;
          break;
        }

        case ChunkedState.READ_DATA_CRLF: {
          if (this.buffer.length < 2) return; // need \r\n
          if (this.buffer[0] !== 0x0d || this.buffer[1] !== 0x0a) {
            throw new Error("Expected CRLF after chunk data");
          }
          this.buffer = this.buffer.subarray(2);
          this.state = ChunkedState.READ_SIZE;
          break;
        }

        case ChunkedState.READ_TRAILER: {
          const line = this.takeLine();
          if (line === null) return;
          // Trailer fields are discarded; an empty line ends the message
          if (line === "") this.state = ChunkedState.DONE;
          break;
        }

        case ChunkedState.DONE:
          return;
      }
    }
  }

  /** Remove and return one CRLF-terminated line, or null if incomplete. */
  private takeLine(): string | null {
    const crlfIdx = this.buffer.indexOf("\r\n");
    if (crlfIdx === -1) {
      if (this.buffer.length > MAX_LINE_LENGTH) {
        throw new Error("Chunk header line too long");
      }
      return null;
    }
    const line = this.buffer.subarray(0, crlfIdx).toString("latin1");
    this.buffer = this.buffer.subarray(crlfIdx + 2);
    return line;
  }
}
