import { describe, expect, it } from "vitest";

import { emitJson, isJsonModeRequested } from "./json-mode.js";

describe("isJsonModeRequested", () => {
  it("defaults to JSON", () => {
    expect(isJsonModeRequested(["search", "--query", "q"])).toBe(true);
    expect(isJsonModeRequested(["search", "--format", "json"])).toBe(true);
  });

  it("turns off for text output", () => {
    expect(isJsonModeRequested(["search", "--format", "text"])).toBe(false);
    expect(isJsonModeRequested(["search", "--format=text"])).toBe(false);
  });
});

describe("emitJson", () => {
  it("writes one compact line", () => {
    const lines: string[] = [];
    emitJson({ ok: true, items: [1, 2] }, (text) => {
      lines.push(text);
    });
    expect(lines).toEqual(["{\"ok\":true,\"items\":[1,2]}\n"]);
  });
});
