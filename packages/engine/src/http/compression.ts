import { constants, gzipSync } from "node:zlib";
import type { Logger } from "../logging/logger.js";

export type Compressor = (data: Uint8Array) => Uint8Array;

export interface NegotiateCompressionOptions {
  /** Replaces the gzip compressor. */
  compress?: Compressor;
  logger?: Logger;
}

export interface NegotiatedBody {
  body: Uint8Array;
  headers: Map<string, string>;
}

export const gzipBestCompression: Compressor = (data) =>
  gzipSync(data, { level: constants.Z_BEST_COMPRESSION });

/**
 * Tokens of an Accept-Encoding value: all whitespace removed, split on commas.
 * Quality values are not interpreted, so "gzip;q=0" is not "gzip".
 */
export function parseAcceptEncoding(value: string | undefined): string[] {
  if (!value) return [];
  return value.replace(/\s+/g, "").split(",");
}

/**
 * Gzip the body when the client lists the exact token "gzip".
 *
 * Compression is best-effort: if it throws, the plain body goes out without a
 * Content-Encoding header. Content-Length is always the byte length of the
 * body that is returned.
 */
export function negotiateCompression(
  body: Uint8Array,
  acceptEncoding: string | undefined,
  options?: NegotiateCompressionOptions,
): NegotiatedBody {
  const headers = new Map<string, string>([["Content-Type", "text/plain"]]);
  let chosen = body;

  if (parseAcceptEncoding(acceptEncoding).includes("gzip")) {
    const compress = options?.compress ?? gzipBestCompression;
    try {
      chosen = compress(body);
      headers.set("Content-Encoding", "gzip");
    } catch (err) {
      options?.logger?.warn("gzip failed, sending uncompressed body:", err);
    }
  }

  headers.set("Content-Length", String(chosen.length));
  return { body: chosen, headers };
}
