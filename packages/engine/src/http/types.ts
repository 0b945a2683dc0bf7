export interface HttpRequest {
  method: string;
  path: string;
  /** Lower-cased header names. The last duplicate wins. */
  headers: Map<string, string>;
  body: Uint8Array;
}

export interface HttpResponseOptions {
  status: number;
  statusText: string;
  headers?: Map<string, string> | Record<string, string>;
  body?: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
};
