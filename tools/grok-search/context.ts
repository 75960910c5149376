import { homedir } from "node:os";

import { grokSearch } from "../../mcp/grok-search/clients/grok.js";
import type { SearchOptions, SearchResult } from "../../mcp/grok-search/types.js";

export type SearchFn = (
  query: string,
  endpoint: string,
  credential: string,
  options?: SearchOptions,
) => Promise<SearchResult>;

/**
 * Process state the handlers read, injectable for tests
 */
export type CliContext = {
  env: Record<string, string | undefined>;
  cwd: string;
  home: string;
  /** Used for ~/.env; defaults to `<home>/.env` */
  envFilePath?: string;
  search: SearchFn;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export function defaultCliContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    home: homedir(),
    search: grokSearch,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
  };
}
