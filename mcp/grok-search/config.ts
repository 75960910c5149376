import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MODEL,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_RETRYABLE_STATUS_CODES,
  DEFAULT_THINKING_BUDGET,
  DEFAULT_TIMEOUT_SECONDS,
} from './clients/grok.js';
import { isJsonObject, parseJson } from './json.js';
import type { SearchOptions } from './types.js';

/**
 * Resolved settings shared by the MCP server and the CLI
 */
export interface GrokSettings {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  enableThinking: boolean;
  thinkingBudget: number;
  extraBody: Record<string, unknown>;
  extraHeaders: Record<string, unknown>;
  maxRetries: number;
  retryDelaySeconds: number;
  retryableStatusCodes: number[];
  systemPrompt?: string;
  showSources: boolean;
  maxSources: number;
}

/**
 * One source of raw setting values, keyed the way config files spell them.
 * Values are unvalidated; resolveSettings decides what is usable.
 */
export type SettingsLayer = Partial<Record<SettingKey, unknown>>;

export const SETTING_KEYS = [
  'base_url',
  'api_key',
  'model',
  'timeout_seconds',
  'enable_thinking',
  'thinking_budget',
  'extra_body',
  'extra_headers',
  'max_retries',
  'retry_delay_seconds',
  'retryable_status_codes',
  'system_prompt',
  'show_sources',
  'max_sources',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

/** Environment variable read for each setting */
export const ENV_VARS: Readonly<Record<SettingKey, string>> = {
  base_url: 'GROK_BASE_URL',
  api_key: 'GROK_API_KEY',
  model: 'GROK_MODEL',
  timeout_seconds: 'GROK_TIMEOUT_SECONDS',
  enable_thinking: 'GROK_ENABLE_THINKING',
  thinking_budget: 'GROK_THINKING_BUDGET',
  extra_body: 'GROK_EXTRA_BODY_JSON',
  extra_headers: 'GROK_EXTRA_HEADERS_JSON',
  max_retries: 'GROK_MAX_RETRIES',
  retry_delay_seconds: 'GROK_RETRY_DELAY_SECONDS',
  retryable_status_codes: 'GROK_RETRYABLE_STATUS_CODES',
  system_prompt: 'GROK_SYSTEM_PROMPT',
  show_sources: 'GROK_SHOW_SOURCES',
  max_sources: 'GROK_MAX_SOURCES',
};

const DEFAULT_MAX_SOURCES = 5;

type Env = Record<string, string | undefined>;

/**
 * Load API key from environment variables or the ~/.env file
 * @param keyName The name of the API key to load
 * @returns The API key value, or '' when neither source has it
 */
export function loadApiKey(
  keyName: string,
  env: Env = process.env,
  envFilePath: string = join(homedir(), '.env'),
): string {
  const envValue = env[keyName]?.trim();
  if (envValue) {
    return envValue;
  }

  try {
    const envContent = readFileSync(envFilePath, 'utf-8');
    const regex = new RegExp(`^${keyName}=(.+)$`, 'm');
    const match = envContent.match(regex);
    if (match?.[1]) {
      return match[1].trim().replace(/^(['"])(.*)\1$/, '$2');
    }
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code !== 'ENOENT' && code !== 'EISDIR') {
      console.error(`[grok-search] Could not read ${envFilePath}: ${String(error)}`);
    }
  }

  return '';
}

/**
 * Build a settings layer from GROK_* environment variables
 */
export function envLayer(env: Env = process.env, envFilePath?: string): SettingsLayer {
  const layer: SettingsLayer = {};
  for (const key of SETTING_KEYS) {
    const value = env[ENV_VARS[key]];
    if (value !== undefined && value.trim().length > 0) {
      layer[key] = value;
    }
  }
  const apiKey = loadApiKey(ENV_VARS.api_key, env, envFilePath);
  if (apiKey) {
    layer.api_key = apiKey;
  }
  return layer;
}

// ============================================================================
// Value parsing
// ============================================================================

/**
 * Parse a JSON-object setting. Objects pass through; strings are parsed.
 */
export function parseJsonConfig(
  value: unknown,
  label: string,
): { value: Record<string, unknown>; error?: string } {
  if (value === undefined || value === null) return { value: {} };
  if (isJsonObject(value)) return { value };
  if (typeof value !== 'string') {
    return { value: {}, error: `${label} must be a JSON object` };
  }
  if (!value.trim()) return { value: {} };

  const parsed = parseJson(value);
  if (!parsed.ok) {
    return { value: {}, error: `${label}: invalid JSON (${parsed.error})` };
  }
  if (!isJsonObject(parsed.value)) {
    return { value: {}, error: `${label} must be a JSON object` };
  }
  return { value: parsed.value };
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim()) {
    const num = Number(value.trim());
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}

function positiveNumber(value: unknown): number | undefined {
  const num = toNumber(value);
  return num !== undefined && num > 0 ? num : undefined;
}

function nonNegativeNumber(value: unknown): number | undefined {
  const num = toNumber(value);
  return num !== undefined && num >= 0 ? num : undefined;
}

function integer(value: unknown): number | undefined {
  const num = toNumber(value);
  return num !== undefined && Number.isInteger(num) ? num : undefined;
}

/**
 * Accepts booleans and "true/1/yes" / "false/0/no" (case-insensitive).
 */
export function parseBooleanSetting(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return undefined;
}

function parseStatusCodes(value: unknown): number[] | undefined {
  const items = Array.isArray(value)
    ? value
    : typeof value === 'string' && value.trim()
      ? value.split(',')
      : undefined;
  if (!items) return undefined;
  const codes = items
    .map((item) => toNumber(item))
    .filter((code): code is number => code !== undefined && Number.isInteger(code));
  return codes.length > 0 ? codes : undefined;
}

function firstOf<T>(
  layers: SettingsLayer[],
  key: SettingKey,
  parse: (value: unknown) => T | undefined,
): T | undefined {
  for (const layer of layers) {
    const parsed = parse(layer[key]);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve settings from layers ordered highest precedence first.
 *
 * Scalars take the first usable value. extra_body and extra_headers merge all
 * layers, higher layers overriding keys of lower ones. Invalid JSON in those
 * maps is reported in `errors` and contributes nothing.
 */
export function resolveSettings(layers: SettingsLayer[]): {
  settings: GrokSettings;
  errors: string[];
} {
  const errors: string[] = [];

  const mergeMaps = (key: 'extra_body' | 'extra_headers'): Record<string, unknown> => {
    const merged: Record<string, unknown> = {};
    for (const layer of [...layers].reverse()) {
      const { value, error } = parseJsonConfig(layer[key], key);
      if (error) errors.push(error);
      Object.assign(merged, value);
    }
    return merged;
  };

  const settings: GrokSettings = {
    baseUrl: firstOf(layers, 'base_url', nonEmptyString) ?? '',
    apiKey: firstOf(layers, 'api_key', nonEmptyString) ?? '',
    model: firstOf(layers, 'model', nonEmptyString) ?? DEFAULT_MODEL,
    timeoutSeconds: firstOf(layers, 'timeout_seconds', positiveNumber) ?? DEFAULT_TIMEOUT_SECONDS,
    enableThinking: firstOf(layers, 'enable_thinking', parseBooleanSetting) ?? true,
    thinkingBudget: Math.floor(
      firstOf(layers, 'thinking_budget', positiveNumber) ?? DEFAULT_THINKING_BUDGET,
    ),
    extraBody: mergeMaps('extra_body'),
    extraHeaders: mergeMaps('extra_headers'),
    maxRetries: Math.floor(
      firstOf(layers, 'max_retries', nonNegativeNumber) ?? DEFAULT_MAX_RETRIES,
    ),
    retryDelaySeconds:
      firstOf(layers, 'retry_delay_seconds', nonNegativeNumber) ?? DEFAULT_RETRY_DELAY_SECONDS,
    retryableStatusCodes:
      firstOf(layers, 'retryable_status_codes', parseStatusCodes) ?? [
        ...DEFAULT_RETRYABLE_STATUS_CODES,
      ],
    systemPrompt: firstOf(layers, 'system_prompt', (v) =>
      typeof v === 'string' ? v : undefined,
    ),
    showSources: firstOf(layers, 'show_sources', parseBooleanSetting) ?? false,
    maxSources: firstOf(layers, 'max_sources', integer) ?? DEFAULT_MAX_SOURCES,
  };

  return { settings, errors };
}

/**
 * Load settings for the MCP server from the environment
 */
export function loadSettings(env: Env = process.env, envFilePath?: string) {
  return resolveSettings([envLayer(env, envFilePath)]);
}

export function toSearchOptions(settings: GrokSettings): SearchOptions {
  return {
    model: settings.model,
    timeoutSeconds: settings.timeoutSeconds,
    enableThinking: settings.enableThinking,
    thinkingBudgetTokens: settings.thinkingBudget,
    extraBody: settings.extraBody,
    extraHeaders: settings.extraHeaders,
    systemPrompt: settings.systemPrompt,
    maxRetries: settings.maxRetries,
    retryDelaySeconds: settings.retryDelaySeconds,
    retryableStatusCodes: new Set(settings.retryableStatusCodes),
  };
}

/**
 * Show enough of a key to recognize it, never the whole value.
 */
export function maskCredential(value: string): string {
  if (!value) return '';
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}
