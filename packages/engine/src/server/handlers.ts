import { type Compressor, negotiateCompression } from "../http/compression.js";
import type { HttpResponseOptions } from "../http/types.js";
import { STATUS_TEXT } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";

export interface EchoOptions {
  compress?: Compressor;
  logger?: Logger;
}

/** A response with no body that still states `Content-Length: 0`. */
export function emptyResponse(
  status: number,
  headers?: Map<string, string>,
): HttpResponseOptions {
  const out = new Map(headers);
  out.set("Content-Length", "0");
  return { status, statusText: STATUS_TEXT[status], headers: out };
}

/** Reflect `text` as text/plain, gzipped when the client accepts it. */
export function echoHandler(
  text: string,
  acceptEncoding: string | undefined,
  options?: EchoOptions,
): HttpResponseOptions {
  const { body, headers } = negotiateCompression(
    fromString(text),
    acceptEncoding,
    options,
  );
  return { status: 200, statusText: STATUS_TEXT[200], headers, body };
}

export function userAgentHandler(
  userAgent: string | undefined,
): HttpResponseOptions {
  const body = fromString(userAgent ?? "");
  return {
    status: 200,
    statusText: STATUS_TEXT[200],
    headers: new Map([
      ["Content-Type", "text/plain"],
      ["Content-Length", String(body.length)],
    ]),
    body,
  };
}
