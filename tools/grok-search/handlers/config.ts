import { maskCredential } from "../../../mcp/grok-search/config.js";
import { normalizeCredential, normalizeEndpoint } from "../../../mcp/grok-search/normalize.js";
import { emitJson, type OutputFormat } from "../cli/json-mode.js";
import { resolveCliSettings } from "../config-files.js";
import type { CliContext } from "../context.js";

export type RunConfigCliArgs = {
  config?: string;
  format: OutputFormat;
};

/**
 * Print the resolved configuration. Header values and the API key never
 * leave the process in full.
 */
export async function runConfig(args: RunConfigCliArgs, ctx: CliContext): Promise<number> {
  const { configPath, settings, errors } = await resolveCliSettings(args.config, {}, ctx);

  for (const error of errors) {
    ctx.stderr(`WARNING: ${error}\n`);
  }
  const baseUrl = normalizeEndpoint(settings.baseUrl);
  if (!baseUrl) {
    ctx.stderr("WARNING: base_url is not set (GROK_BASE_URL or base_url in the config file)\n");
  }
  if (!normalizeCredential(settings.apiKey)) {
    ctx.stderr("WARNING: api_key is not set (GROK_API_KEY or api_key in the config file)\n");
  }

  const view: Record<string, unknown> = {
    config_path: configPath,
    base_url: baseUrl,
    api_key: maskCredential(normalizeCredential(settings.apiKey)),
    model: settings.model,
    timeout_seconds: settings.timeoutSeconds,
    enable_thinking: settings.enableThinking,
    thinking_budget: settings.thinkingBudget,
    extra_body: settings.extraBody,
    extra_header_names: Object.keys(settings.extraHeaders),
    max_retries: settings.maxRetries,
    retry_delay_seconds: settings.retryDelaySeconds,
    retryable_status_codes: settings.retryableStatusCodes,
    show_sources: settings.showSources,
    max_sources: settings.maxSources,
  };

  if (args.format === "json") {
    emitJson(view, ctx.stdout);
    return 0;
  }

  for (const [key, value] of Object.entries(view)) {
    ctx.stdout(`${key}: ${typeof value === "string" ? value : JSON.stringify(value)}\n`);
  }
  return 0;
}
