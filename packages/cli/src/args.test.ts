import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("returns defaults with no arguments", () => {
    expect(parseArgs([])).toEqual({
      kind: "run",
      options: {
        directory: ".",
        port: 4221,
        host: "0.0.0.0",
        quiet: false,
        logLevel: "info",
      },
    });
  });

  it("reads the base directory", () => {
    const parsed = parseArgs(["--directory", "/tmp/data"]);
    expect(parsed).toMatchObject({
      kind: "run",
      options: { directory: "/tmp/data" },
    });
  });

  it("accepts --name=value for long options", () => {
    const parsed = parseArgs(["--directory=/srv", "--port=8080"]);
    expect(parsed).toMatchObject({
      kind: "run",
      options: { directory: "/srv", port: 8080 },
    });
  });

  it("reads short flags", () => {
    const parsed = parseArgs(["-d", "files", "-p", "0", "-H", "127.0.0.1", "-q"]);
    expect(parsed).toEqual({
      kind: "run",
      options: {
        directory: "files",
        port: 0,
        host: "127.0.0.1",
        quiet: true,
        logLevel: "info",
      },
    });
  });

  it("maps --verbose to debug logging", () => {
    expect(parseArgs(["--verbose"])).toMatchObject({
      kind: "run",
      options: { logLevel: "debug" },
    });
  });

  it("validates --log-level", () => {
    expect(parseArgs(["--log-level", "warn"])).toMatchObject({
      kind: "run",
      options: { logLevel: "warn" },
    });
    expect(parseArgs(["--log-level", "loud"])).toEqual({
      kind: "error",
      message: "Invalid log level: loud",
    });
  });

  it.each([["--port", "abc"], ["--port", "70000"], ["-p", "1.5"], ["--port"]])(
    "rejects an invalid port: %s %s",
    (...args: string[]) => {
      expect(parseArgs(args)).toEqual({
        kind: "error",
        message: "Invalid port number",
      });
    },
  );

  it("requires a value for --directory", () => {
    expect(parseArgs(["--directory"])).toEqual({
      kind: "error",
      message: "--directory requires a value",
    });
  });

  it("rejects unknown options", () => {
    expect(parseArgs(["--cors"])).toEqual({
      kind: "error",
      message: "Unknown option: --cors",
    });
  });

  it("short-circuits on help and version", () => {
    expect(parseArgs(["-q", "--help", "--bogus"])).toEqual({ kind: "help" });
    expect(parseArgs(["-v"])).toEqual({ kind: "version" });
  });
});
