import {
  command,
  oneOf,
  option,
  optional,
  string,
} from "cmd-ts";

import { OUTPUT_FORMATS } from "../cli/json-mode.js";
import type { RunConfigCliArgs } from "../handlers/config.js";

export function createConfigCmd(deps: {
  runConfig: (args: RunConfigCliArgs) => Promise<number>;
}) {
  return command({
    name: "config",
    description: "Show the resolved configuration with the API key masked",
    args: {
      config: option({ long: "config", type: optional(string), description: "Path to a config JSON file" }),
      format: option({ long: "format", type: optional(oneOf(OUTPUT_FORMATS)), description: "Output format (json or text)" }),
    },
    handler: async (args) => {
      process.exitCode = await deps.runConfig({
        config: args.config,
        format: args.format ?? "json",
      });
    },
  });
}
