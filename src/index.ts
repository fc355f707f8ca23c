#!/usr/bin/env node
import { runStdioServer } from "./mcp/stdioServer";
import { bootstrapRuntime } from "./runtime/bootstrapRuntime";
import { createLogger } from "./shared/log";

const log = createLogger("main");

async function main(): Promise<void> {
  const runtime = await bootstrapRuntime();
  await runStdioServer(runtime);
  await runtime.close();
}

process.on("unhandledRejection", (error) => {
  log.error("unhandled rejection", error);
  process.exit(1);
});

main().catch((error) => {
  log.error("fatal startup error", error);
  process.exit(1);
});
