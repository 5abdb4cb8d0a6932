import { existsSync, readFileSync } from "fs";
import { join } from "path";
import dotenv from "dotenv";
import { parse } from "yaml";
import { log } from "./log.js";

/**
 * Values that can come from environment variables and YAML files
 */
export type ConfigScalar = string | number | boolean;

type ConfigSource = Record<string, unknown>;

const overrides = new Map<string, unknown>();
const fileCache = new Map<string, ConfigSource[]>();
let dotenvLoaded = false;

/**
 * Name of the running environment.
 *
 * Priority: APP_ENV > NODE_ENV > "local"
 */
export function environmentName(): string {
  return (process.env.APP_ENV || process.env.NODE_ENV || "local").trim().toLowerCase();
}

/**
 * Environment variable consulted for a config key.
 *
 * @example configKeyToEnvVar("web.serverPort") // "WEB_SERVER_PORT"
 */
export function configKeyToEnvVar(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[.-]/g, "_")
    .toUpperCase();
}

function isRecord(value: unknown): value is ConfigSource {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ConfigScalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function readYamlFile(path: string): ConfigSource {
  const parsed: unknown = parse(readFileSync(path, "utf8"));
  return isRecord(parsed) ? parsed : {};
}

/**
 * YAML sources for the current environment, most specific first
 */
function fileSources(): ConfigSource[] {
  if (!dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }

  const dir = process.env.CONFIG_DIR || join(process.cwd(), "config");
  const env = environmentName();
  const cacheKey = `${dir}|${env}`;
  const cached = fileCache.get(cacheKey);
  if (cached) return cached;

  const sources = [join(dir, `app-${env}.yaml`), join(dir, "app.yaml")]
    .filter((path) => existsSync(path))
    .map(readYamlFile);

  fileCache.set(cacheKey, sources);
  return sources;
}

/**
 * Look up a dotted key, either flat ("web.serverPort: 9000") or nested
 */
function lookup(source: ConfigSource, key: string): unknown {
  if (key in source) return source[key];

  let current: unknown = source;
  for (const segment of key.split(".")) {
    if (!isRecord(current) || !(segment in current)) return undefined;
    current = current[segment];
  }
  return current;
}

function rawValue(key: string): unknown {
  if (overrides.has(key)) return overrides.get(key);

  const fromEnv = process.env[configKeyToEnvVar(key)];
  if (fromEnv !== undefined) return fromEnv;

  for (const source of fileSources()) {
    const value = lookup(source, key);
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function coerceBoolean(value: ConfigScalar): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
  }
  return null;
}

function coerceNumber(value: ConfigScalar): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Raw config value, or null when the key is not set anywhere
 */
export function configOrNull(key: string): ConfigScalar | null {
  const value = rawValue(key);
  return isScalar(value) ? value : null;
}

/**
 * Read a config value, coerced to the type of the default.
 *
 * Lookup order: setConfig() overrides, environment variable derived from
 * the key, `app-<env>.yaml`, `app.yaml`.
 */
export function config(key: string, defaultValue: boolean): boolean;
export function config(key: string, defaultValue: number): number;
export function config(key: string, defaultValue: string): string;
export function config(key: string, defaultValue: ConfigScalar): ConfigScalar {
  const value = configOrNull(key);
  if (value === null) return defaultValue;

  if (typeof defaultValue === "boolean") return coerceBoolean(value) ?? defaultValue;
  if (typeof defaultValue === "number") return coerceNumber(value) ?? defaultValue;
  return String(value);
}

/**
 * Read a pluggable object registered with setConfig()
 */
export function configObject<T>(
  key: string,
  guard: (value: unknown) => value is T,
  defaultValue: T
): T {
  if (!overrides.has(key)) return defaultValue;

  const value = overrides.get(key);
  if (guard(value)) return value;

  log(`Ignoring ${key}: configured value has the wrong shape`, "config");
  return defaultValue;
}

/**
 * Override a config value for this process
 */
export function setConfig(key: string, value: unknown): void {
  overrides.set(key, value);
}

/**
 * Drop all overrides and cached config files
 */
export function resetConfig(): void {
  overrides.clear();
  fileCache.clear();
}
