/**
 * System prompts for web-search requests
 *
 * The default prompt asks for a single JSON object so the Content Extractor
 * can read `content` and `sources` directly. Models that ignore it still
 * produce usable results through the free-text fallback.
 */

export const DEFAULT_SYSTEM_PROMPT =
  'You are a web research assistant. Use live web search/browsing when answering. ' +
  'Return ONLY a single JSON object with keys: ' +
  'content (string), sources (array of objects with url/title/snippet when possible). ' +
  'Keep content concise and evidence-backed. ' +
  'IMPORTANT: Do NOT use Markdown formatting in the content field - use plain text only.';

/**
 * An explicit override wins, even an empty one.
 */
export function selectSystemPrompt(
  override: string | undefined,
  fallback: string = DEFAULT_SYSTEM_PROMPT,
): string {
  return override !== undefined ? override : fallback;
}
