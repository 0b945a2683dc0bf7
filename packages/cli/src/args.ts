import { isLogLevel, type LogLevel } from "@tinyhttpd/engine";

export interface CliOptions {
  /** Base directory for /files, as given (not yet resolved). */
  directory: string;
  port: number;
  host: string;
  quiet: boolean;
  logLevel: LogLevel;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const USAGE = `
tinyhttpd - a small HTTP/1.1 server

Usage: tinyhttpd [options]

Options:
  --directory, -d <dir>  Directory for /files reads and uploads (default: .)
  --port, -p <port>      Port to listen on (default: 4221)
  --host, -H <host>      Host to bind (default: 0.0.0.0)
  --quiet, -q            Suppress request logging
  --verbose              Log headers, bodies and responses (same as --log-level debug)
  --log-level <level>    One of debug, info, warn, error (default: info)
  --version, -v          Show version
  --help, -h             Show this help
`;

/**
 * Parse command-line arguments. Long options also take `--name=value`.
 * Never exits; the caller decides what to do with help, version and errors.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {
    directory: ".",
    port: 4221,
    host: "0.0.0.0",
    quiet: false,
    logLevel: "info",
  };

  let i = 0;
  while (i < args.length) {
    let arg = args[i];
    let inlineValue: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq !== -1) {
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    const takeValue = (): string | undefined => {
      if (inlineValue !== undefined) return inlineValue;
      i++;
      return args[i];
    };

    if (arg === "--directory" || arg === "-d") {
      const value = takeValue();
      if (!value) return { kind: "error", message: `${arg} requires a value` };
      options.directory = value;
    } else if (arg === "--port" || arg === "-p") {
      const value = takeValue();
      const port = value === undefined ? Number.NaN : Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        return { kind: "error", message: "Invalid port number" };
      }
      options.port = port;
    } else if (arg === "--host" || arg === "-H") {
      const value = takeValue();
      if (!value) return { kind: "error", message: `${arg} requires a value` };
      options.host = value;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--verbose") {
      options.logLevel = "debug";
    } else if (arg === "--log-level") {
      const value = takeValue();
      if (!value || !isLogLevel(value)) {
        return { kind: "error", message: `Invalid log level: ${value ?? ""}` };
      }
      options.logLevel = value;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "run", options };
}
