import path from "node:path";
import zlib from "node:zlib";
import { Transform } from "node:stream";
import { ZstdDecompressStream } from "./zstdStream";

export type CompressionFormat = "zstd" | "gzip";

export const DECOMPRESSED_SUFFIX = ".json.jsonl";

const FORMAT_BY_EXTENSION: Readonly<Record<string, CompressionFormat>> = {
  ".zst": "zstd",
  ".gz": "gzip",
};

export type OutputName =
  | { kind: "target"; name: string; format: CompressionFormat }
  | { kind: "decompressed" }
  | { kind: "unrecognized" };

export function detectFormat(fileName: string): CompressionFormat | undefined {
  return FORMAT_BY_EXTENSION[path.extname(fileName).toLowerCase()];
}

export function isCompressedShard(fileName: string): boolean {
  return detectFormat(fileName) !== undefined;
}

/**
 * Maps `x.jsonl.zst`, `x.json.gz` and friends to `x.json.jsonl`. Other inner extensions keep
 * their name with `.jsonl` appended in place of the compression extension.
 */
export function deriveOutputName(fileName: string): OutputName {
  if (fileName.endsWith(DECOMPRESSED_SUFFIX)) {
    return { kind: "decompressed" };
  }

  const format = detectFormat(fileName);
  if (!format) {
    return { kind: "unrecognized" };
  }

  const stem = fileName.slice(0, -path.extname(fileName).length);
  const name = stem.endsWith(".jsonl") ? `${stem.slice(0, -".jsonl".length)}${DECOMPRESSED_SUFFIX}` : `${stem}.jsonl`;
  return { kind: "target", name, format };
}

export function createDecompressor(format: CompressionFormat, blockBytes: number): Transform {
  if (format === "gzip") {
    return zlib.createGunzip({ chunkSize: blockBytes });
  }
  return new ZstdDecompressStream();
}
