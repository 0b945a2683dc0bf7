import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString, findSequence } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_READ_BUFFER_SIZE = 1024;

export interface ReadRequestOptions {
  /** Bytes kept from the single read. Default: 1024 */
  maxBytes?: number;
}

export type HttpRequestReadErrorCode = "CONNECTION_CLOSED" | "SOCKET_ERROR";

export class HttpRequestReadError extends Error {
  constructor(
    readonly code: HttpRequestReadErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpRequestReadError";
  }
}

/**
 * Perform exactly one read on the socket. Resolves with the first chunk it
 * delivers, truncated to `maxBytes`; anything the peer sends afterwards is
 * ignored.
 *
 * Listeners are attached synchronously, so call this before awaiting
 * anything else on a freshly accepted socket.
 */
export function readRequestBytes(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<Uint8Array> {
  const maxBytes = options?.maxBytes ?? DEFAULT_READ_BUFFER_SIZE;

  return new Promise((resolve, reject) => {
    let settled = false;

    socket.onData((data) => {
      if (settled) return;
      settled = true;
      resolve(data.slice(0, maxBytes));
    });

    socket.onClose(() => {
      if (settled) return;
      settled = true;
      reject(
        new HttpRequestReadError(
          "CONNECTION_CLOSED",
          "Connection closed before any data was received",
        ),
      );
    });

    socket.onError((err) => {
      if (settled) return;
      settled = true;
      reject(
        new HttpRequestReadError("SOCKET_ERROR", err.message, { cause: err }),
      );
    });
  });
}

/**
 * Parse the raw bytes of one request.
 *
 * Lenient by design: a missing request-line token becomes an empty string and
 * header lines without a colon are skipped. This never throws.
 */
export function parseHttpRequest(raw: Uint8Array): HttpRequest {
  const separatorIndex = findSequence(raw, CRLF_CRLF);
  const head =
    separatorIndex === -1 ? raw : raw.subarray(0, separatorIndex);
  const body =
    separatorIndex === -1
      ? new Uint8Array(0)
      : raw.slice(separatorIndex + CRLF_CRLF.length);

  const lines = decodeToString(head).split("\n");
  const requestLineParts = (lines[0] ?? "").trimEnd().split(" ");
  const method = requestLineParts[0] ?? "";
  const path = requestLineParts[1] ?? "";

  const headers = new Map<string, string>();
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") break;

    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;
    const key = line.substring(0, colonIdx).trim().toLowerCase();
    const value = line.substring(colonIdx + 1).trim();
    headers.set(key, value);
  }

  return { method, path, headers, body };
}
