import crypto from "node:crypto";
import { gunzipSync, gzipSync } from "node:zlib";
import { runtimeFailure } from "../errors.js";

export const UPLOAD_CHUNK_SIZE = 1024;

export interface PayloadInfo {
  sha256: string;
  count: number;
  size: number;
}

export interface EncodedPayload extends PayloadInfo {
  chunks: string[];
}

export const sha256Hex = (data: Buffer): string =>
  crypto.createHash("sha256").update(data).digest("hex");

export const splitIntoChunks = (text: string, size: number): string[] => {
  const chunks: string[] = [];
  for (let offset = 0; offset < text.length; offset += size) {
    chunks.push(text.slice(offset, offset + size));
  }
  return chunks;
};

/** gzip, then base64, then fixed-width chunks; the digest covers the original bytes. */
export const encodePayload = (data: Buffer, chunkSize = UPLOAD_CHUNK_SIZE): EncodedPayload => {
  const chunks = splitIntoChunks(gzipSync(data).toString("base64"), chunkSize);
  return {
    sha256: sha256Hex(data),
    count: chunks.length,
    size: data.length,
    chunks
  };
};

export const parsePayloadInfo = (text: string): PayloadInfo | null => {
  const match = /^([0-9a-f]{64}) (\d+) (\d+)$/.exec(text.trim());
  if (!match) {
    return null;
  }
  return {
    sha256: match[1],
    count: Number.parseInt(match[2], 10),
    size: Number.parseInt(match[3], 10)
  };
};

export const decodePayload = (chunks: ReadonlyMap<number, string>, info: PayloadInfo): Buffer => {
  const missing: number[] = [];
  for (let index = 0; index < info.count; index += 1) {
    if (!chunks.has(index)) {
      missing.push(index);
    }
  }
  if (missing.length > 0) {
    const listed = missing.slice(0, 10).join(", ");
    throw runtimeFailure(
      `Integrity check failed: ${missing.length} chunk(s) missing (${listed}${missing.length > 10 ? ", ..." : ""})`
    );
  }

  const encoded = Array.from({ length: info.count }, (_, index) => chunks.get(index) ?? "").join("");
  let data: Buffer;
  try {
    data = gunzipSync(Buffer.from(encoded, "base64"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw runtimeFailure(`Integrity check failed: payload could not be decompressed (${message})`);
  }
  if (data.length !== info.size || sha256Hex(data) !== info.sha256) {
    throw runtimeFailure("Integrity check failed: sha256 mismatch");
  }
  return data;
};
