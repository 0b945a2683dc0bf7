export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' (all interfaces) */
  host: string;
  /** Base directory for the /files routes. Joined with the request name, not sandboxed. */
  directory: string;
  /** Bytes kept from the single read of each connection. Default: 1024 */
  readBufferSize: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(directory: string): ServerConfig {
  return {
    port: 4221,
    host: "0.0.0.0",
    directory,
    readBufferSize: 1024,
    quiet: false,
  };
}
