import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponseOptions } from "./types.js";

/**
 * Render a response to wire bytes: status line, one line per header in the
 * mapping's iteration order, a blank line, then the body untouched.
 *
 * No headers are added here. Callers set Content-Length and Content-Type.
 */
export function serializeResponse(response: HttpResponseOptions): Uint8Array {
  const headerBytes = buildHeaderBytes(
    response.status,
    response.statusText,
    headerEntries(response.headers),
  );
  return concat([headerBytes, response.body ?? new Uint8Array(0)]);
}

/**
 * Send a complete HTTP response (headers + body) over a socket in one write.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
): Promise<void> {
  const data = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}

function buildHeaderBytes(
  status: number,
  statusText: string,
  headers: Iterable<[string, string]>,
): Uint8Array {
  const lines: string[] = [`HTTP/1.1 ${status} ${statusText}`];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}

function headerEntries(
  headers?: Map<string, string> | Record<string, string>,
): Iterable<[string, string]> {
  if (!headers) return [];
  if (headers instanceof Map) return headers;
  return Object.entries(headers);
}
