import fs from "fs";
import path from "path";
import { loadConfig, LOG_LEVELS } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { createClients, GitHubClient } from "./github";
import { logger, setLogLevel } from "./logger";
import { Poller } from "./poll";
import { targetKey } from "./utils";
import type { AppConfig } from "./types";

export const SAMPLE_CONFIG_PATH = path.join(__dirname, "..", "config.example.yml");

const COMMANDS = ["monitor", "status", "generate-config", "test-connection"] as const;
type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  configPath?: string;
  logLevel?: string;
  output?: string;
  server: string;
  repository?: string;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = [
  "Usage: pr-shepherd [--config <file>] [--log-level <level>] <command>",
  "",
  "Commands:",
  "  monitor                                  Poll configured repositories (default)",
  "  status                                   Show the resolved configuration",
  "  generate-config [--output <file>]        Print or write a sample YAML config",
  "  test-connection <owner/name> [--server <name>]",
  "                                           List open PRs for one repository",
].join("\n");

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseCliArgs(argv: string[]): CliArgs | { error: string } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  const aliases: Record<string, string> = { "-c": "config", "-l": "log-level", "-o": "output", "-s": "server" };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("-")) {
      const eq = arg.indexOf("=");
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const name = aliases[flag] ?? flag.replace(/^--/, "");
      if (!["config", "log-level", "output", "server"].includes(name)) {
        return { error: `Unknown option: ${flag}` };
      }
      const value: string | undefined = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === "") {
        return { error: `Missing value for ${flag}` };
      }
      flags[name] = value;
    } else {
      positional.push(arg);
    }
  }

  const command = positional[0] ?? "monitor";
  if (!isCommand(command)) {
    return { error: `Unknown command: ${command}` };
  }

  const logLevel = flags["log-level"]?.toLowerCase();
  if (logLevel !== undefined && !LOG_LEVELS.some((level) => level === logLevel)) {
    return { error: `Invalid log level: ${flags["log-level"]}` };
  }

  if (command === "test-connection" && !positional[1]) {
    return { error: "test-connection requires a repository (owner/name)" };
  }

  return {
    command,
    configPath: flags.config,
    logLevel,
    output: flags.output,
    server: flags.server ?? "default",
    repository: positional[1],
  };
}

export function formatStatus(config: AppConfig): string[] {
  const { settings } = config;
  const lines = ["Configuration Status", "=".repeat(30), `GitHub Servers: ${config.servers.length}`];
  config.servers.forEach((server, i) => {
    lines.push(`  ${i + 1}. ${server.name} (${server.url}) - Token: ${server.token ? "set" : "missing"}`);
  });
  lines.push(
    "",
    "Monitoring:",
    `  Poll interval: ${settings.pollInterval}s`,
    `  Max concurrent: ${settings.maxConcurrent}`,
    `  Request timeout: ${settings.requestTimeout}s`,
    `  Eviction cycles: ${settings.evictionCycles}`,
    `  Auto-approve runs: ${settings.autoApprove}`,
    `  Auto-fix with Copilot: ${settings.autoFix} (${settings.copilotMention})`,
    "",
    `Repositories (${config.targets.length}):`,
    ...config.targets.map((target) => `  - ${targetKey(target)}`),
    "",
    `Log level: ${settings.logLevel}`
  );
  return lines;
}

async function monitor(config: AppConfig, io: CliIO): Promise<number> {
  const controller = new AbortController();
  const stop = (signal: string) => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, "Shutting down after current cycle...");
    controller.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  io.out(`Monitoring ${config.targets.map(targetKey).join(", ")} every ${config.settings.pollInterval}s`);
  const clients = createClients(config.servers, config.settings.requestTimeout * 1000);
  const poller = new Poller(config, clients);
  await poller.run(controller.signal);
  return 0;
}

async function testConnection(config: AppConfig, args: CliArgs, io: CliIO): Promise<number> {
  const server = config.servers.find((s) => s.name === args.server);
  if (!server) {
    io.err(`Error: Server '${args.server}' not found in configuration`);
    return 1;
  }

  const repository = args.repository ?? "";
  const client = new GitHubClient(server, { timeoutMs: config.settings.requestTimeout * 1000 });
  io.out(`Testing connection to ${server.url}...`);
  try {
    const prs = await client.fetchOpenPullRequests(repository);
    io.out(`Connected to ${server.name}; ${prs.length} open pull requests in ${repository}:`);
    for (const pr of prs.slice(0, 5)) {
      io.out(`  #${pr.ref.number}: ${pr.title} (${pr.author}) - ${pr.checkRuns.length} checks, ${pr.workflowRuns.length} runs`);
    }
    if (prs.length > 5) {
      io.out(`  ... and ${prs.length - 5} more`);
    }
    return 0;
  } catch (e) {
    io.err(`Connection failed: ${errorMessage(e)}`);
    return 1;
  }
}

function generateConfig(args: CliArgs, io: CliIO): number {
  const content = fs.readFileSync(SAMPLE_CONFIG_PATH, "utf-8");
  if (args.output) {
    fs.writeFileSync(args.output, content, "utf-8");
    io.out(`Sample configuration written to ${args.output}`);
  } else {
    io.out(content);
  }
  return 0;
}

export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const args = parseCliArgs(argv);
  if ("error" in args) {
    io.err(args.error);
    io.err(USAGE);
    return 1;
  }

  if (args.logLevel) {
    setLogLevel(args.logLevel);
  }

  if (args.command === "generate-config") {
    return generateConfig(args, io);
  }

  let config: AppConfig;
  try {
    config = loadConfig({ configPath: args.configPath });
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    io.err(`Error: ${e.message}`);
    for (const issue of e.issues) {
      io.err(`  ${issue.field}: ${issue.message}`);
    }
    return 1;
  }

  if (!args.logLevel) {
    setLogLevel(config.settings.logLevel);
  }

  switch (args.command) {
    case "status":
      formatStatus(config).forEach((line) => io.out(line));
      return 0;
    case "test-connection":
      return testConnection(config, args, io);
    case "monitor":
      return monitor(config, io);
  }
}
