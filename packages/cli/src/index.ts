#!/usr/bin/env node
import { parseArgs, USAGE } from "./args.js";
import { type RunningServer, serve } from "./serve.js";
import { VERSION } from "./version.js";

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  switch (parsed.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "version":
      console.log(VERSION);
      return;
    case "error":
      console.error(parsed.message);
      console.error(USAGE);
      process.exit(1);
  }

  const { options } = parsed;

  let running: RunningServer;
  try {
    running = await serve(options);
  } catch (err) {
    console.error(`Failed to bind to port ${options.port}:`, err);
    process.exit(1);
  }
  const { server, port, directory, logger } = running;

  // Accept failures after startup take the whole process down.
  server.on("error", (err) => {
    logger.error("Exiting after listener error:", err.message);
    process.exit(1);
  });

  console.log(`\n  tinyhttpd listening on ${options.host}:${port}`);
  console.log(`  Files:     ${directory}\n`);

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
