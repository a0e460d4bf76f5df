#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { LOG_FILE } from "./env";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  let shuttingDown = false;
  const exit = (code: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app
      .shutdown()
      .catch((err) => {
        console.warn("Shutdown failed:", err);
      })
      .finally(() => {
        loggingHandle.shutdown();
        process.exit(code);
      });
  };

  const app = await buildApplication({ onQuit: () => exit(0) });

  process.on("SIGINT", () => {
    console.log("\nExiting…");
    exit(0);
  });

  await app.start();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
