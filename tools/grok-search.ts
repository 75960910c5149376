#!/usr/bin/env node

import type { Type } from "cmd-ts";
import {
  runSafely,
  subcommands,
} from "cmd-ts";

import { parseBooleanSetting } from "../mcp/grok-search/config.js";
import { EXIT_CONFIG, errorDetails } from "./grok-search/cli/errors.js";
import {
  configureStdoutForJsonMode,
  emitJson,
  getCliArgv,
  isJsonModeRequested,
} from "./grok-search/cli/json-mode.js";
import { createConfigCmd } from "./grok-search/cmd/config.js";
import { createSearchCmd } from "./grok-search/cmd/search.js";
import { defaultCliContext } from "./grok-search/context.js";
import { runConfig } from "./grok-search/handlers/config.js";
import { runSearch } from "./grok-search/handlers/search.js";

const CLI_ARGV = getCliArgv();
const JSON_MODE_REQUESTED = isJsonModeRequested(CLI_ARGV);

configureStdoutForJsonMode(JSON_MODE_REQUESTED);

const BooleanText: Type<string, boolean> = {
  async from(str) {
    const value = parseBooleanSetting(str);
    if (value === undefined) {
      throw new Error(`Expected true or false, got "${str}"`);
    }
    return value;
  },
};

const ctx = defaultCliContext();

const searchCmd = createSearchCmd({
  BooleanText,
  runSearch: (args) => runSearch(args, ctx),
});

const configCmd = createConfigCmd({
  runConfig: (args) => runConfig(args, ctx),
});

const app = subcommands({
  name: "grok-search",
  description: "Web search through an OpenAI-compatible Grok endpoint",
  cmds: {
    search: searchCmd,
    config: configCmd,
  },
});

runSafely(app, CLI_ARGV)
  .then((result) => {
    if (result._tag === "ok") return;

    // --help and --version come back as errors with exit code 0
    if (result.error.config.exitCode === 0) {
      result.error.run();
      return;
    }

    if (JSON_MODE_REQUESTED) {
      emitJson({
        ok: false,
        error: result.error.config.message,
        error_code: "CLI_PARSE_ERROR",
      });
    } else {
      console.error(result.error.config.message);
    }
    process.exit(EXIT_CONFIG);
  })
  .catch((error: unknown) => {
    const { code, message, exitCode } = errorDetails(error);

    if (JSON_MODE_REQUESTED) {
      emitJson({ ok: false, error: message, error_code: code });
    } else {
      console.error(`ERROR: ${message}`);
    }

    process.exit(exitCode);
  });
