import {
  command,
  number,
  oneOf,
  option,
  optional,
  string,
  type Type,
} from "cmd-ts";

import { OUTPUT_FORMATS } from "../cli/json-mode.js";
import type { RunSearchCliArgs } from "../handlers/search.js";

export function createSearchCmd(deps: {
  BooleanText: Type<string, boolean>;
  runSearch: (args: RunSearchCliArgs) => Promise<number>;
}) {
  return command({
    name: "search",
    description: "Search the web through the Grok endpoint and print the answer with its sources",
    args: {
      query: option({ long: "query", type: string, description: "Search query or research task" }),
      config: option({ long: "config", type: optional(string), description: "Path to a config JSON file" }),
      baseUrl: option({ long: "base-url", type: optional(string), description: "Override the base URL" }),
      apiKey: option({ long: "api-key", type: optional(string), description: "Override the API key" }),
      model: option({ long: "model", type: optional(string), description: "Override the model" }),
      timeoutSeconds: option({ long: "timeout-seconds", type: optional(number), description: "Per-attempt timeout in seconds" }),
      enableThinking: option({ long: "enable-thinking", type: optional(deps.BooleanText), description: "Enable thinking mode (true/false)" }),
      thinkingBudget: option({ long: "thinking-budget", type: optional(number), description: "Thinking token budget" }),
      extraBodyJson: option({ long: "extra-body-json", type: optional(string), description: "JSON object merged into the request body" }),
      extraHeadersJson: option({ long: "extra-headers-json", type: optional(string), description: "JSON object merged into the request headers" }),
      maxRetries: option({ long: "max-retries", type: optional(number), description: "Retries after the first attempt" }),
      format: option({ long: "format", type: optional(oneOf(OUTPUT_FORMATS)), description: "Output format (json or text)" }),
    },
    handler: async (args) => {
      process.exitCode = await deps.runSearch({
        query: args.query,
        config: args.config,
        baseUrl: args.baseUrl,
        apiKey: args.apiKey,
        model: args.model,
        timeoutSeconds: args.timeoutSeconds,
        enableThinking: args.enableThinking,
        thinkingBudget: args.thinkingBudget,
        extraBodyJson: args.extraBodyJson,
        extraHeadersJson: args.extraHeadersJson,
        maxRetries: args.maxRetries,
        format: args.format ?? "json",
      });
    },
  });
}
