/**
 * Argument parsing for the podmig CLI.
 */

export type CliCommand =
  | { command: "serve" }
  | { command: "migrate"; podUID: string; containers: string[]; url: string }
  | { command: "help" }
  | { command: "unknown"; name: string; error?: string };

export const DEFAULT_AGENT_URL = "http://127.0.0.1:10250";

export function parseCliArgs(args: string[]): CliCommand {
  const command = args[0];

  switch (command) {
    case "serve":
    case "start":
      return { command: "serve" };
    case "migrate": {
      const podUID = args[1];
      if (!podUID || podUID.startsWith("--")) {
        return { command: "unknown", name: "migrate", error: "missing <podUID>" };
      }
      let containers: string[] = [];
      let url = DEFAULT_AGENT_URL;
      for (let i = 2; i < args.length; i++) {
        if (args[i] === "--containers" && args[i + 1]) {
          containers = args[++i].split(",").map((s) => s.trim()).filter((s) => s.length > 0);
        } else if (args[i] === "--url" && args[i + 1]) {
          url = args[++i];
        }
      }
      return { command: "migrate", podUID, containers, url };
    }
    case "help":
    case "--help":
    case "-h":
    case undefined:
      return { command: "help" };
    default:
      return { command: "unknown", name: command };
  }
}

/** URL of the migrate route for a pod on the agent at `baseUrl`. */
export function buildMigrateUrl(baseUrl: string, podUID: string, containers: string[]): string {
  const url = new URL(`/migrate/${encodeURIComponent(podUID)}`, baseUrl);
  if (containers.length > 0) {
    url.searchParams.set("containers", containers.join(","));
  }
  return url.toString();
}
