import fs from "fs";
import { parse } from "yaml";
import { z } from "zod";
import { logger } from "./logger";
import { ConfigError, errorMessage, type ValidationError } from "./errors";
import { parseBoolean, parseNumber, parseTarget, splitList } from "./utils";
import type { AppConfig, LogLevel, MonitorSettings, RepositoryTarget, ServerConfig } from "./types";

export const DEFAULT_GITHUB_URL = "https://api.github.com";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const DEFAULT_SETTINGS: MonitorSettings = {
  pollInterval: 60,
  autoApprove: true,
  autoFix: true,
  evictionCycles: 1,
  maxConcurrent: 3,
  requestTimeout: 30,
  copilotMention: "@copilot",
  logLevel: "info",
};

// Configuration as read from a source, before targets are resolved and checked
export interface RawConfig {
  servers: ServerConfig[];
  repositories: string[];
  settings: MonitorSettings;
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function serverFromEnv(env: Env, prefix: string, fallbackName: string): ServerConfig {
  return {
    name: env[`${prefix}NAME`] || fallbackName,
    url: env[`${prefix}URL`] || DEFAULT_GITHUB_URL,
    token: env[`${prefix}TOKEN`] || "",
  };
}

export function loadEnvConfig(env: Env = process.env): RawConfig {
  const servers = [serverFromEnv(env, "GITHUB_", "default")];

  // Additional servers: GITHUB_1_URL / GITHUB_1_TOKEN / GITHUB_1_NAME, GITHUB_2_...
  for (let i = 1; env[`GITHUB_${i}_URL`] || env[`GITHUB_${i}_TOKEN`]; i++) {
    servers.push(serverFromEnv(env, `GITHUB_${i}_`, `server-${i}`));
  }

  const level = (env.LOG_LEVEL || DEFAULT_SETTINGS.logLevel).toLowerCase();

  return {
    servers,
    repositories: splitList(env.REPOS),
    settings: {
      pollInterval: parseNumber(env.POLL_INTERVAL, DEFAULT_SETTINGS.pollInterval),
      autoApprove: parseBoolean(env.AUTO_APPROVE, DEFAULT_SETTINGS.autoApprove),
      autoFix: parseBoolean(env.AUTO_FIX, DEFAULT_SETTINGS.autoFix),
      evictionCycles: parseNumber(env.EVICTION_CYCLES, DEFAULT_SETTINGS.evictionCycles),
      maxConcurrent: parseNumber(env.MAX_CONCURRENT, DEFAULT_SETTINGS.maxConcurrent),
      requestTimeout: parseNumber(env.REQUEST_TIMEOUT, DEFAULT_SETTINGS.requestTimeout),
      copilotMention: env.COPILOT_MENTION || DEFAULT_SETTINGS.copilotMention,
      logLevel: isLogLevel(level) ? level : DEFAULT_SETTINGS.logLevel,
    },
  };
}

const YamlConfigSchema = z
  .object({
    servers: z
      .array(
        z
          .object({
            name: z.string().min(1),
            url: z.string().optional(),
            token: z.string().optional(),
          })
          .strict()
      )
      .optional(),
    repositories: z.array(z.string()).optional(),
    monitoring: z
      .object({
        poll_interval: z.number().optional(),
        auto_approve: z.boolean().optional(),
        auto_fix: z.boolean().optional(),
        eviction_cycles: z.number().optional(),
        max_concurrent: z.number().optional(),
        request_timeout: z.number().optional(),
        copilot_mention: z.string().optional(),
      })
      .strict()
      .optional(),
    log_level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  })
  .strict();

// Replaces ${NAME} in every string value; unset variables become empty strings
export function expandEnv(value: unknown, env: Env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnv(item, env));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnv(v, env)]));
  }
  return value;
}

export function parseYamlConfig(content: string, env: Env = process.env): RawConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (e) {
    throw new ConfigError([{ field: "config", message: `invalid YAML: ${errorMessage(e)}` }]);
  }

  const result = YamlConfigSchema.safeParse(expandEnv(raw ?? {}, env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        field: issue.path.join(".") || "config",
        message: issue.message,
      }))
    );
  }

  const data = result.data;
  const monitoring = data.monitoring ?? {};
  const servers = data.servers?.map((server) => ({
    name: server.name,
    url: server.url || DEFAULT_GITHUB_URL,
    token: server.token ?? "",
  }));

  return {
    servers: servers ?? [serverFromEnv(env, "GITHUB_", "default")],
    repositories: data.repositories ?? [],
    settings: {
      pollInterval: monitoring.poll_interval ?? DEFAULT_SETTINGS.pollInterval,
      autoApprove: monitoring.auto_approve ?? DEFAULT_SETTINGS.autoApprove,
      autoFix: monitoring.auto_fix ?? DEFAULT_SETTINGS.autoFix,
      evictionCycles: monitoring.eviction_cycles ?? DEFAULT_SETTINGS.evictionCycles,
      maxConcurrent: monitoring.max_concurrent ?? DEFAULT_SETTINGS.maxConcurrent,
      requestTimeout: monitoring.request_timeout ?? DEFAULT_SETTINGS.requestTimeout,
      copilotMention: monitoring.copilot_mention ?? DEFAULT_SETTINGS.copilotMention,
      logLevel: data.log_level ?? DEFAULT_SETTINGS.logLevel,
    },
  };
}

export function loadYamlConfig(configPath: string, env: Env = process.env): RawConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (e) {
    throw new ConfigError([{ field: "config", message: `cannot read ${configPath}: ${errorMessage(e)}` }]);
  }
  return parseYamlConfig(content, env);
}

export function validateSettings(settings: MonitorSettings): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!Number.isFinite(settings.pollInterval) || settings.pollInterval <= 0) {
    errors.push({ field: "pollInterval", message: "Poll interval must be a positive number of seconds" });
  }

  if (!Number.isInteger(settings.evictionCycles) || settings.evictionCycles < 1) {
    errors.push({ field: "evictionCycles", message: "Eviction cycles must be an integer of at least 1" });
  }

  if (!Number.isInteger(settings.maxConcurrent) || settings.maxConcurrent < 1) {
    errors.push({ field: "maxConcurrent", message: "Max concurrent must be an integer of at least 1" });
  } else if (settings.maxConcurrent > 10) {
    errors.push({ field: "maxConcurrent", message: "Max concurrent cannot exceed 10" });
  }

  if (!Number.isFinite(settings.requestTimeout) || settings.requestTimeout <= 0) {
    errors.push({ field: "requestTimeout", message: "Request timeout must be a positive number of seconds" });
  }

  if (!settings.copilotMention.trim()) {
    errors.push({ field: "copilotMention", message: "Copilot mention cannot be empty" });
  }

  return errors;
}

function validateServers(servers: readonly ServerConfig[]): ValidationError[] {
  const errors: ValidationError[] = [];
  const names = new Set<string>();

  for (const server of servers) {
    if (names.has(server.name)) {
      errors.push({ field: "servers", message: `Duplicate server name '${server.name}'` });
    }
    names.add(server.name);

    if (server.name.includes("/") || server.name.includes(":")) {
      errors.push({ field: "servers", message: `Server name '${server.name}' cannot contain '/' or ':'` });
    }

    let protocol = "";
    try {
      protocol = new URL(server.url).protocol;
    } catch {
      errors.push({ field: "servers", message: `Invalid URL for server '${server.name}': ${server.url}` });
      continue;
    }
    if (protocol !== "http:" && protocol !== "https:") {
      errors.push({ field: "servers", message: `URL for server '${server.name}' must be http(s)` });
    }
  }

  return errors;
}

/**
 * Turns a raw configuration into the validated form the monitor runs on.
 * Servers without a token are dropped with a warning. Throws ConfigError
 * listing every problem found.
 */
export function resolveConfig(raw: RawConfig): AppConfig {
  const errors = [...validateSettings(raw.settings), ...validateServers(raw.servers)];

  const servers = raw.servers.filter((server) => {
    if (server.token) return true;
    logger.warn({ server: server.name }, "No token provided for server, skipping");
    return false;
  });
  if (servers.length === 0) {
    errors.push({ field: "servers", message: "No GitHub tokens configured (set GITHUB_TOKEN or use a config file)" });
  }

  const serverNames = servers.map((s) => s.name);
  const knownNames = new Set(raw.servers.map((s) => s.name));
  const targets: RepositoryTarget[] = [];
  const seen = new Set<string>();

  for (const spec of raw.repositories) {
    const parsed = parseTarget(spec, serverNames);
    if (!parsed) {
      errors.push({ field: "repositories", message: `Invalid repository '${spec}' (expected owner/name or server/owner/name)` });
      continue;
    }
    for (const target of parsed) {
      if (!knownNames.has(target.server)) {
        errors.push({ field: "repositories", message: `Repository '${spec}' names unknown server '${target.server}'` });
        continue;
      }
      if (!serverNames.includes(target.server)) {
        logger.warn({ repository: spec, server: target.server }, "Server has no token, skipping repository");
        continue;
      }
      const key = `${target.server}:${target.repository}`;
      if (seen.has(key)) continue;
      seen.add(key);
      targets.push(target);
    }
  }

  if (raw.repositories.length === 0) {
    errors.push({ field: "repositories", message: "No repositories configured (set REPOS, e.g. owner/repo1,owner/repo2)" });
  } else if (targets.length === 0 && errors.length === 0) {
    errors.push({ field: "repositories", message: "No repository is on a server with a token" });
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return { servers, targets, settings: { ...raw.settings } };
}

export function loadConfig(options: { configPath?: string; env?: Env } = {}): AppConfig {
  const env = options.env ?? process.env;
  const raw = options.configPath ? loadYamlConfig(options.configPath, env) : loadEnvConfig(env);
  return resolveConfig(raw);
}
