import { Transform, TransformCallback, TransformOptions } from "node:stream";
import { Decompress } from "fzstd";

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Streaming zstd decoder. fzstd keeps only the frame window in memory, and accepts the
 * large windows long-distance-matching shards are written with.
 */
export class ZstdDecompressStream extends Transform {
  private readonly decoder: Decompress;

  constructor(options?: TransformOptions) {
    super(options);
    this.decoder = new Decompress((chunk) => {
      if (chunk.length > 0) {
        this.push(Buffer.from(chunk));
      }
    });
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      this.decoder.push(chunk);
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }

  _flush(callback: TransformCallback): void {
    try {
      this.decoder.push(new Uint8Array(0), true);
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }
}
