/**
 * Response Decoder
 *
 * Turns a 200 response body into one CanonicalMessage. Endpoints answer either
 * with a single chat-completions JSON object or with an SSE stream of
 * `data: {...}` chunks even when `stream: false` was requested, and do not
 * reliably label which one they sent.
 */

import {
  asArray,
  asNumber,
  asObject,
  asString,
  getPath,
  isEmptyJson,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  jsonTypeName,
  parseJson,
  truncate,
} from './json.js';
import type { CanonicalMessage, TokenUsage } from './types.js';

export type DecodeFailureKind =
  | 'malformed_json'
  | 'malformed_stream'
  | 'api_error'
  | 'empty_response';

export type DecodeResult =
  | { ok: true; message: CanonicalMessage }
  | { ok: false; kind: DecodeFailureKind; error: string; detail: string };

const EVENT_STREAM_MEDIA_TYPE = 'text/event-stream';
const DATA_PREFIX = 'data:';
const DONE_TOKEN = '[DONE]';

export function isEventStream(body: string, contentType: string): boolean {
  return (
    contentType.toLowerCase().includes(EVENT_STREAM_MEDIA_TYPE) ||
    body.trim().startsWith(DATA_PREFIX)
  );
}

/**
 * Parse every `data:` line into a JSON object. Lines that do not parse are
 * skipped so one bad chunk does not lose the whole answer.
 */
export function parseEventStream(body: string): JsonObject[] {
  const events: JsonObject[] = [];
  for (const rawLine of body.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(':')) continue;
    if (!line.startsWith(DATA_PREFIX)) continue;

    const data = line.slice(DATA_PREFIX.length).trim();
    if (data === DONE_TOKEN) continue;

    const parsed = parseJson(data);
    if (parsed.ok && isJsonObject(parsed.value)) {
      events.push(parsed.value);
    }
  }
  return events;
}

/**
 * Fold stream chunks into the shape of a non-streaming response so both
 * encodings share the post-decode checks.
 */
function mergeStreamEvents(events: JsonObject[]): JsonObject {
  let content = '';
  let model = '';
  let usage: JsonValue | undefined;
  let error: JsonValue | undefined;

  for (const event of events) {
    if (!model) model = asString(event.model);
    if (!isEmptyJson(event.usage)) usage = event.usage;
    if (error === undefined && (typeof event.error === 'string' || isJsonObject(event.error))) {
      error = event.error;
    }
    const delta = getPath(event, ['choices', 0, 'delta', 'content']);
    if (typeof delta === 'string') content += delta;
  }

  const merged: JsonObject = {
    choices: [{ message: { content } }],
    model,
    usage: usage ?? {},
  };
  if (error !== undefined) merged.error = error;
  return merged;
}

function readUsage(value: JsonValue | undefined): TokenUsage | undefined {
  const usage = asObject(value);
  if (!usage || Object.keys(usage).length === 0) return undefined;
  return {
    promptTokens: asNumber(usage.prompt_tokens),
    completionTokens: asNumber(usage.completion_tokens),
    totalTokens: asNumber(usage.total_tokens),
  };
}

/**
 * Message content is normally a string; some endpoints send an array of
 * `{type: "text", text}` parts instead.
 */
export function readChoiceContent(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  const parts = asArray(value);
  if (!parts) return '';
  return parts
    .map((part) => {
      const obj = asObject(part);
      if (!obj) return typeof part === 'string' ? part : '';
      return asString(obj.type) === 'text' || obj.type === undefined ? asString(obj.text) : '';
    })
    .join('');
}

function apiErrorMessage(error: JsonValue): string {
  if (typeof error === 'string') return error;
  const message = asObject(error)?.message;
  if (typeof message === 'string') return message;
  return JSON.stringify(error);
}

/**
 * Checks shared by both encodings once a response object exists.
 */
function interpret(data: JsonObject): DecodeResult {
  const detail = () => truncate(JSON.stringify(data));

  if (typeof data.error === 'string' || isJsonObject(data.error)) {
    return {
      ok: false,
      kind: 'api_error',
      error: `API returned an error: ${apiErrorMessage(data.error)}`,
      detail: detail(),
    };
  }

  const choices = data.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    const shape = Array.isArray(choices) ? 'empty array' : jsonTypeName(choices);
    return {
      ok: false,
      kind: 'empty_response',
      error: `Response has no usable choices field (${shape})`,
      detail: detail(),
    };
  }

  const message = getPath(choices, [0, 'message']);
  if (!isJsonObject(message)) {
    return {
      ok: false,
      kind: 'empty_response',
      error: `choices[0].message is ${jsonTypeName(message)}`,
      detail: detail(),
    };
  }

  const content = readChoiceContent(message.content);
  if (!content) {
    return {
      ok: false,
      kind: 'empty_response',
      error: 'choices[0].message.content is empty',
      detail: detail(),
    };
  }

  return {
    ok: true,
    message: {
      content,
      model: asString(data.model),
      usage: readUsage(data.usage),
    },
  };
}

export function decode(body: string, contentType: string): DecodeResult {
  if (isEventStream(body, contentType)) {
    const events = parseEventStream(body);
    if (events.length === 0) {
      return {
        ok: false,
        kind: 'malformed_stream',
        error: 'Could not parse the event-stream response',
        detail: truncate(body),
      };
    }
    return interpret(mergeStreamEvents(events));
  }

  const parsed = parseJson(body);
  if (!parsed.ok) {
    return {
      ok: false,
      kind: 'malformed_json',
      error: `Response is not valid JSON: ${parsed.error}`,
      detail: truncate(body),
    };
  }

  if (!isJsonObject(parsed.value)) {
    return {
      ok: false,
      kind: 'empty_response',
      error: `Response is a JSON ${jsonTypeName(parsed.value)}, expected an object`,
      detail: truncate(body),
    };
  }

  return interpret(parsed.value);
}
