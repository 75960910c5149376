import { toSearchOptions } from "../../../mcp/grok-search/config.js";
import type { SettingsLayer } from "../../../mcp/grok-search/config.js";
import { formatResult } from "../../../mcp/grok-search/format.js";
import { normalizeCredential, normalizeEndpoint } from "../../../mcp/grok-search/normalize.js";
import type { SearchResult } from "../../../mcp/grok-search/types.js";
import { throwWithCode } from "../cli/errors.js";
import { emitJson, type OutputFormat } from "../cli/json-mode.js";
import { resolveCliSettings } from "../config-files.js";
import type { CliContext } from "../context.js";

export const EXIT_OK = 0;
export const EXIT_SEARCH_FAILED = 1;

export type RunSearchCliArgs = {
  query: string;
  config?: string;
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  timeoutSeconds?: number;
  enableThinking?: boolean;
  thinkingBudget?: number;
  extraBodyJson?: string;
  extraHeadersJson?: string;
  maxRetries?: number;
  format: OutputFormat;
};

function flagLayer(args: RunSearchCliArgs): SettingsLayer {
  return {
    base_url: args.baseUrl,
    api_key: args.apiKey,
    model: args.model,
    timeout_seconds: args.timeoutSeconds,
    enable_thinking: args.enableThinking,
    thinking_budget: args.thinkingBudget,
    extra_body: args.extraBodyJson,
    extra_headers: args.extraHeadersJson,
    max_retries: args.maxRetries,
  };
}

export function successEnvelope(
  query: string,
  configPath: string,
  model: string,
  result: SearchResult,
): Record<string, unknown> {
  return {
    ok: true,
    query,
    config_path: configPath,
    model: result.model ?? model,
    content: result.content,
    sources: result.sources,
    raw: result.raw,
    usage: result.usage
      ? {
        prompt_tokens: result.usage.promptTokens,
        completion_tokens: result.usage.completionTokens,
        total_tokens: result.usage.totalTokens,
      }
      : null,
    elapsed_ms: result.elapsedMs,
    retries: result.retries,
  };
}

export function failureEnvelope(
  configPath: string,
  model: string,
  result: SearchResult,
): Record<string, unknown> {
  return {
    ok: false,
    error: result.error ?? "Unknown error",
    error_kind: result.errorKind ?? null,
    detail: result.detail ?? null,
    config_path: configPath,
    model: result.model ?? model,
    elapsed_ms: result.elapsedMs,
    retries: result.retries,
  };
}

/**
 * Run one search and report it. Resolves to the process exit code.
 */
export async function runSearch(args: RunSearchCliArgs, ctx: CliContext): Promise<number> {
  const query = args.query.trim();
  if (!query) {
    throwWithCode("INVALID_ARGS", "--query cannot be empty");
  }

  const { configPath, settings, errors } = await resolveCliSettings(args.config, flagLayer(args), ctx);
  if (errors.length > 0) {
    throwWithCode("INVALID_JSON", errors.join("; "));
  }
  if (!normalizeEndpoint(settings.baseUrl)) {
    throwWithCode(
      "MISSING_BASE_URL",
      `Missing base URL: set GROK_BASE_URL, write it to the config file, or pass --base-url\nConfig path: ${configPath}`,
    );
  }
  if (!normalizeCredential(settings.apiKey)) {
    throwWithCode(
      "MISSING_API_KEY",
      `Missing API key: set GROK_API_KEY, write it to the config file, or pass --api-key\nConfig path: ${configPath}`,
    );
  }

  const result = await ctx.search(query, settings.baseUrl, settings.apiKey, toSearchOptions(settings));

  if (args.format === "json") {
    emitJson(
      result.ok
        ? successEnvelope(query, configPath, settings.model, result)
        : failureEnvelope(configPath, settings.model, result),
      ctx.stdout,
    );
  } else if (result.ok) {
    ctx.stdout(`${formatResult(result, { showSources: true, maxSources: settings.maxSources })}\n`);
  } else {
    ctx.stderr(`${formatResult(result)}\n`);
    if (result.detail) {
      ctx.stderr(`${result.detail}\n`);
    }
  }

  return result.ok ? EXIT_OK : EXIT_SEARCH_FAILED;
}
