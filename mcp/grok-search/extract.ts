/**
 * Content Extractor
 *
 * The system prompt asks for one JSON object `{content, sources}`. Models do
 * not always comply, so free text is accepted too and its URLs become sources.
 */

import {
  asArray,
  isEmptyJson,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  parseJson,
} from './json.js';
import type { Source } from './types.js';

export interface ExtractedContent {
  content: string;
  sources: Source[];
  /** Set to the original text when it was not a JSON object */
  raw: string;
}

const URL_PATTERN = /https?:\/\/[^\s)\]}>"']+/g;
const TRAILING_PUNCTUATION = /[.,;:!?'"]+$/;

/**
 * Parse text as a JSON object only when it looks like one.
 */
export function coerceJsonObject(text: string): JsonObject | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) return undefined;
  const parsed = parseJson(trimmed);
  return parsed.ok && isJsonObject(parsed.value) ? parsed.value : undefined;
}

/**
 * Literal URLs in order of first appearance, trailing punctuation removed.
 */
export function extractUrls(text: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, '');
    if (url && !seen.has(url)) {
      seen.add(url);
      out.push(url);
    }
  }
  return out;
}

function toText(value: JsonValue | undefined): string {
  if (value === undefined || isEmptyJson(value)) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function urlSources(text: string): Source[] {
  return extractUrls(text).map((url) => ({ url, title: '', snippet: '' }));
}

function structuredSources(value: JsonValue | undefined): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];
  for (const item of asArray(value) ?? []) {
    if (!isJsonObject(item)) continue;
    const url = toText(item.url);
    if (!url || seen.has(url)) continue;
    seen.add(url);
    sources.push({
      url,
      title: toText(item.title),
      snippet: toText(item.snippet),
    });
  }
  return sources;
}

export function extract(assistantText: string): ExtractedContent {
  const parsed = coerceJsonObject(assistantText);

  if (parsed) {
    const content = toText(parsed.content);
    let sources = structuredSources(parsed.sources);
    // An empty sources array is not trusted as "no sources": scan the answer.
    if (sources.length === 0) sources = urlSources(content);

    if (content || sources.length > 0) {
      return { content, sources, raw: '' };
    }
  }

  return {
    content: assistantText,
    sources: urlSources(assistantText),
    raw: assistantText,
  };
}
