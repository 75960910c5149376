import * as fs from "node:fs/promises";
import { join } from "node:path";

import {
  ENV_VARS,
  envLayer,
  type GrokSettings,
  resolveSettings,
  SETTING_KEYS,
  type SettingsLayer,
} from "../../mcp/grok-search/config.js";
import { isJsonObject, parseJson } from "../../mcp/grok-search/json.js";
import { normalizeCredential } from "../../mcp/grok-search/normalize.js";
import { throwWithCode } from "./cli/errors.js";
import type { CliContext } from "./context.js";

export const CONFIG_PATH_ENV = "GROK_CONFIG_PATH";

export type LoadedConfig = {
  /** The file that supplied the layer, or the first candidate when none exists */
  path: string;
  layer: SettingsLayer;
};

export function defaultConfigPaths(cwd: string, home: string): string[] {
  return [
    join(cwd, "grok-search.json"),
    join(cwd, "grok-search.local.json"),
    join(home, ".config", "grok-search", "config.json"),
  ];
}

export function toSettingsLayer(value: Record<string, unknown>): SettingsLayer {
  const layer: SettingsLayer = {};
  for (const key of SETTING_KEYS) {
    if (Object.hasOwn(value, key)) {
      layer[key] = value[key];
    }
  }
  return layer;
}

/**
 * Read a JSON config object. A missing file reads as `{}`; anything else that
 * is not a JSON object is a configuration error.
 */
export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") return {};
    const reason = error instanceof Error ? error.message : String(error);
    throwWithCode("INVALID_CONFIG", `Invalid config (${filePath}): ${reason}`);
  }

  const parsed = parseJson(raw.replace(/^\uFEFF/, ""));
  if (!parsed.ok) {
    throwWithCode("INVALID_CONFIG", `Invalid config (${filePath}): ${parsed.error}`);
  }
  if (!isJsonObject(parsed.value)) {
    throwWithCode("INVALID_CONFIG", `Invalid config (${filePath}): config must be a JSON object`);
  }
  return parsed.value;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the config file: `--config`, then GROK_CONFIG_PATH, then the first
 * default location holding a usable api_key, then the first that exists.
 */
export async function loadConfigFile(
  explicitPath: string | undefined,
  ctx: Pick<CliContext, "env" | "cwd" | "home">,
): Promise<LoadedConfig> {
  const explicit = explicitPath?.trim() || ctx.env[CONFIG_PATH_ENV]?.trim();
  if (explicit) {
    return { path: explicit, layer: toSettingsLayer(await readConfigFile(explicit)) };
  }

  const candidates = defaultConfigPaths(ctx.cwd, ctx.home);
  let fallback: LoadedConfig | undefined;
  for (const candidate of candidates) {
    if (!(await exists(candidate))) continue;

    const config = await readConfigFile(candidate);
    const loaded = { path: candidate, layer: toSettingsLayer(config) };
    fallback ??= loaded;

    const apiKey = typeof config.api_key === "string" ? config.api_key : "";
    if (normalizeCredential(apiKey)) {
      return loaded;
    }
  }

  return fallback ?? { path: candidates[0] ?? "", layer: {} };
}

export type ResolvedCliSettings = {
  configPath: string;
  settings: GrokSettings;
  errors: string[];
};

/**
 * Resolve settings with precedence flags > environment > config file > defaults.
 * An API key found only in ~/.env ranks below the config file.
 */
export async function resolveCliSettings(
  configPath: string | undefined,
  flags: SettingsLayer,
  ctx: Pick<CliContext, "env" | "cwd" | "home" | "envFilePath">,
): Promise<ResolvedCliSettings> {
  const config = await loadConfigFile(configPath, ctx);
  const env = envLayer(ctx.env, ctx.envFilePath ?? join(ctx.home, ".env"));
  const dotenv: SettingsLayer = {};
  if (!ctx.env[ENV_VARS.api_key]?.trim() && env.api_key !== undefined) {
    dotenv.api_key = env.api_key;
    delete env.api_key;
  }
  const { settings, errors } = resolveSettings([flags, env, config.layer, dotenv]);
  return { configPath: config.path, settings, errors };
}
