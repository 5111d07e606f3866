import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { ValidationError, parseClientConfig, type ClientConfig } from "@crawlbridge/schemas";

export const DEFAULT_CONFIG: Readonly<ClientConfig> = {
  serverUrl: "ws://localhost:8080/socket",
  username: "",
  password: "",
  gameId: "",
  species: "b",
  background: "f",
  weapon: "",
  narrateInterval: 5,
  actionTimeoutMs: 5000,
  statusPath: null,
  logLevel: "info",
};

/** Looked up in this order in the working directory. */
export const CONFIG_FILE_NAMES = [
  "crawlbridge.config.yaml",
  "crawlbridge.config.yml",
  "crawlbridge.config.json",
] as const;

const ENV_KEYS: ReadonlyArray<readonly [keyof ClientConfig, string]> = [
  ["serverUrl", "CRAWLBRIDGE_SERVER_URL"],
  ["username", "CRAWLBRIDGE_USERNAME"],
  ["password", "CRAWLBRIDGE_PASSWORD"],
  ["gameId", "CRAWLBRIDGE_GAME_ID"],
  ["species", "CRAWLBRIDGE_SPECIES"],
  ["background", "CRAWLBRIDGE_BACKGROUND"],
  ["weapon", "CRAWLBRIDGE_WEAPON"],
  ["narrateInterval", "CRAWLBRIDGE_NARRATE_INTERVAL"],
  ["actionTimeoutMs", "CRAWLBRIDGE_ACTION_TIMEOUT_MS"],
  ["statusPath", "CRAWLBRIDGE_STATUS_PATH"],
  ["logLevel", "CRAWLBRIDGE_LOG_LEVEL"],
];

const INTEGER_KEYS: ReadonlySet<keyof ClientConfig> = new Set<keyof ClientConfig>([
  "narrateInterval",
  "actionTimeoutMs",
]);

type ConfigLayer = Record<string, unknown>;

export type ConfigFlags = Partial<Record<keyof ClientConfig, unknown>>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit file; must exist. Without it the working directory is searched. */
  configPath?: string;
  /** Command-line values; checked by the schema with everything else. */
  flags?: ConfigFlags;
}

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/** Reads a YAML or JSON config file into a plain object. */
export function readConfigFile(path: string): ConfigLayer {
  if (!existsSync(path)) throw new Error(`Config file not found: ${path}`);
  const raw = readFileSync(path, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ValidationError(`config file ${path}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) throw new ValidationError(`config file ${path}`, ["/: must be a mapping"]);
  return data;
}

/**
 * Picks the CRAWLBRIDGE_* variables out of an environment. Integer keys are
 * converted when they look like integers and left as text otherwise so the
 * schema reports them; an empty status path means none.
 */
export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, name] of ENV_KEYS) {
    const value = env[name];
    if (value === undefined) continue;
    if (key === "statusPath") {
      layer[key] = value === "" ? null : value;
    } else if (INTEGER_KEYS.has(key) && /^-?\d+$/.test(value.trim())) {
      layer[key] = Number(value.trim());
    } else {
      layer[key] = value;
    }
  }
  return layer;
}

function definedOnly(flags: ConfigFlags): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) layer[key] = value;
  }
  return layer;
}

/** Merges defaults, config file, environment and flags, later layers winning. */
export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
  const cwd = options.cwd ?? process.cwd();
  const filePath = options.configPath ? resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fileLayer = filePath ? readConfigFile(filePath) : {};
  const merged: ConfigLayer = {
    ...DEFAULT_CONFIG,
    ...fileLayer,
    ...envLayer(options.env ?? process.env),
    ...definedOnly(options.flags ?? {}),
  };
  return parseClientConfig(merged);
}

/** Commander argument parser for integer options; `min` bounds the value from below. */
export function parseIntOption(value: string, label: string, min = 1): number {
  const n = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < min) {
    const rule = min === 0 ? "a non-negative integer" : min === 1 ? "a positive integer" : `an integer >= ${min}`;
    throw new Error(`Invalid ${label}: "${value}" (must be ${rule})`);
  }
  return n;
}
