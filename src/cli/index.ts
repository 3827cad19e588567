#!/usr/bin/env node
/**
 * podmig CLI: pod migration node agent.
 *
 * Commands:
 *   podmig serve                                  Start the agent
 *   podmig migrate <podUID> [--containers a,b]    Ask a running agent to migrate a pod
 */

import { startAgent } from "../agent.js";
import { buildMigrateUrl, parseCliArgs } from "./args.js";

function showHelp(): void {
  console.log(`
podmig: pod migration node agent

Usage:
  podmig <command> [options]

Commands:
  serve                          Start the agent (config: $PODMIG_CONFIG, ./podmig.json, ~/.podmig/podmig.json)
  migrate <podUID> [options]     Checkpoint a pod and print the checkpoint locations
    --containers <a,b>           Containers to checkpoint (default: all)
    --url <url>                  Agent URL (default: http://127.0.0.1:10250)
  help                           Show this help message

Examples:
  podmig serve
  podmig migrate 6f1c2a --containers web,sidecar
`);
}

async function cmdServe(): Promise<void> {
  const agent = await startAgent();

  const shutdown = (signal: string) => {
    agent.logger.info(`[podmig:cli] received ${signal}, shutting down`);
    agent.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function cmdMigrate(podUID: string, containers: string[], baseUrl: string): Promise<void> {
  const res = await fetch(buildMigrateUrl(baseUrl, podUID, containers), { method: "POST" });
  const text = await res.text();
  if (!res.ok) {
    console.error(`Migration failed (${res.status}): ${text}`);
    process.exit(1);
  }
  console.log(JSON.stringify(JSON.parse(text), null, 2));
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));

  switch (parsed.command) {
    case "serve":
      await cmdServe();
      break;
    case "migrate":
      await cmdMigrate(parsed.podUID, parsed.containers, parsed.url);
      break;
    case "help":
      showHelp();
      break;
    case "unknown":
      console.error(parsed.error ? `${parsed.name}: ${parsed.error}` : `Unknown command: ${parsed.name}`);
      showHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
