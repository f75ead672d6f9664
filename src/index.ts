#!/usr/bin/env node
import readline from "readline";
import { loadConfig, loadEnv } from "./config";
import { createPrompt } from "./cli/helpers";
import { runReportCardManager } from "./cli/reportCardManager";
import { withRosterStore } from "./stores/rosterStore";

export async function main(): Promise<void> {
  loadEnv();
  const config = loadConfig();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const ask = createPrompt(rl);

  // Ctrl+C and termination close the prompt; the menu loop then
  // unwinds and the roster is saved on the way out.
  const close = () => rl.close();
  rl.on("SIGINT", close);
  process.once("SIGINT", close);
  process.once("SIGTERM", close);

  try {
    await withRosterStore(config.dataFile, (store) => runReportCardManager(ask, store));
  } finally {
    process.off("SIGINT", close);
    process.off("SIGTERM", close);
    rl.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Report card manager failed:", err);
    process.exitCode = 1;
  });
}
