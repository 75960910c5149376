/**
 * Grok API Client
 *
 * Web search through an OpenAI-compatible chat-completions endpoint that has
 * live search enabled on the provider side.
 *
 * FEATURES:
 * - Structured `{content, sources}` answers with a free-text fallback
 * - JSON and event-stream responses (servers may stream despite stream=false)
 * - Bounded retries with linear backoff on transport errors and retryable statuses
 * - Optional caller-owned connection reused across calls
 *
 * Every failure comes back as a SearchResult with ok=false. The only rejection
 * is caller cancellation through options.signal.
 */

import { decode } from '../decoder.js';
import { extract } from '../extract.js';
import { truncate } from '../json.js';
import { normalizeCredential, normalizeEndpoint } from '../normalize.js';
import { selectSystemPrompt } from '../prompts.js';
import { type AttemptOutcome, abortReason, runWithRetry, timerDelayMs } from '../retry.js';
import type {
  CanonicalMessage,
  ChatMessage,
  Connection,
  SearchErrorKind,
  SearchOptions,
  SearchResult,
} from '../types.js';

// ============================================================================
// Configuration & Types
// ============================================================================

export interface ChatRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

type AttemptReport =
  | { ok: true; message: CanonicalMessage; status: number }
  | {
      ok: false;
      kind: SearchErrorKind;
      error: string;
      detail: string;
      status?: number;
    };

// ============================================================================
// Constants
// ============================================================================

export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/** Model the front ends ask for when none is configured */
export const DEFAULT_MODEL = 'grok-4-fast';

export const DEFAULT_TIMEOUT_SECONDS = 60;
export const DEFAULT_THINKING_BUDGET = 32000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 1;
export const DEFAULT_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
]);

/** Fixed low temperature keeps answers repeatable */
const TEMPERATURE = 0.2;

export const PROTECTED_BODY_KEYS: ReadonlySet<string> = new Set(['model', 'messages', 'stream']);

/** Compared lower-case */
export const PROTECTED_HEADER_KEYS: ReadonlySet<string> = new Set(['authorization', 'content-type']);

const STATUS_HINTS: Readonly<Record<number, string>> = {
  400: 'Bad request, check the extra_body settings',
  401: 'Authentication failed, check that api_key is correct',
  403: 'Access denied, check the API key permissions',
  404: 'Endpoint not found, check the base_url setting',
  429: 'Rate limited, try again later',
  500: 'Internal server error',
  502: 'Bad gateway, the API service may be temporarily unavailable',
  503: 'Service temporarily unavailable, try again later',
};

export const MISSING_ENDPOINT_ERROR =
  'Missing base_url: set the Grok API endpoint (GROK_BASE_URL or base_url in the config)';
export const MISSING_CREDENTIAL_ERROR =
  'Missing api_key: set the API key (GROK_API_KEY or api_key in the config)';

// ============================================================================
// Request Construction
// ============================================================================

export function statusHint(status: number): string {
  return STATUS_HINTS[status] ?? '';
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
}

/**
 * Build the POST for an already-normalized endpoint and credential.
 * Caller extras are merged last but never replace protected fields.
 */
export function buildChatRequest(
  query: string,
  endpoint: string,
  credential: string,
  options: SearchOptions = {},
): ChatRequest {
  const messages: ChatMessage[] = [
    { role: 'system', content: selectSystemPrompt(options.systemPrompt) },
    { role: 'user', content: query },
  ];

  const body: Record<string, unknown> = {
    messages,
    temperature: TEMPERATURE,
    stream: false,
  };
  if (options.model) {
    body.model = options.model;
  }

  if (options.enableThinking ?? true) {
    body.reasoning_effort = 'high';
    const budget = options.thinkingBudgetTokens ?? DEFAULT_THINKING_BUDGET;
    if (budget > 0) {
      body.reasoning_budget_tokens = budget;
    }
  }

  for (const [key, value] of Object.entries(options.extraBody ?? {})) {
    if (!PROTECTED_BODY_KEYS.has(key)) {
      body[key] = value;
    }
  }

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Authorization: `Bearer ${credential}`,
  };
  for (const [key, value] of Object.entries(options.extraHeaders ?? {})) {
    if (!PROTECTED_HEADER_KEYS.has(key.toLowerCase())) {
      headers[key] = String(value);
    }
  }

  return { url: `${endpoint}${CHAT_COMPLETIONS_PATH}`, headers, body };
}

// ============================================================================
// Connections
// ============================================================================

/**
 * Open a connection backed by the global fetch. Closing it only makes
 * further requests fail; sockets belong to the runtime's pool.
 */
export function openConnection(): Connection {
  let closed = false;
  return {
    get closed() {
      return closed;
    },
    async fetch(url, init) {
      if (closed) {
        throw new Error('Connection is closed');
      }
      return globalThis.fetch(url, init);
    },
    async close() {
      closed = true;
    },
  };
}

// ============================================================================
// API Client
// ============================================================================

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * One HTTP round trip, bounded by the per-attempt timeout.
 */
async function attemptOnce(
  request: ChatRequest,
  connection: Connection | undefined,
  timeoutSeconds: number,
  retryableStatusCodes: ReadonlySet<number>,
  signal: AbortSignal | undefined,
  debug: boolean,
): Promise<AttemptOutcome<AttemptReport>> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timerDelayMs(timeoutSeconds * 1000));
  const onCallerAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  // A caller connection closed by its owner is replaced for this attempt only.
  const conn: Connection =
    connection === undefined || connection.closed ? openConnection() : connection;
  const transient = conn !== connection;
  if (transient && connection !== undefined && debug) {
    console.error('[grok-search] Shared connection is closed, using a transient one');
  }

  try {
    const response = await conn.fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });
    const text = await response.text();

    if (response.status !== 200) {
      const hint = statusHint(response.status);
      return {
        kind: 'failure',
        retryable: retryableStatusCodes.has(response.status),
        value: {
          ok: false,
          kind: 'upstream_status',
          error: hint ? `HTTP ${response.status} - ${hint}` : `HTTP ${response.status}`,
          detail: truncate(text),
          status: response.status,
        },
      };
    }

    const decoded = decode(text, response.headers.get('content-type') ?? '');
    if (!decoded.ok) {
      return {
        kind: 'failure',
        retryable: false,
        value: {
          ok: false,
          kind: 'upstream_payload',
          error: decoded.error,
          detail: decoded.detail,
          status: response.status,
        },
      };
    }

    return {
      kind: 'success',
      value: { ok: true, message: decoded.message, status: response.status },
    };
  } catch (error) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    const message = timedOut
      ? `Request timed out after ${timeoutSeconds}s; check the network or raise timeout_seconds`
      : `Network request failed: ${describeNetworkError(error)}`;
    return {
      kind: 'failure',
      retryable: true,
      value: { ok: false, kind: 'transport', error: message, detail: '' },
    };
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCallerAbort);
    if (transient) {
      await conn.close();
    }
  }
}

/**
 * Execute a web search query against the Grok endpoint
 *
 * @param query - The search query to execute
 * @param endpoint - Base URL; a trailing `/v1` is accepted
 * @param credential - Bearer token
 * @returns SearchResult with content and sources
 */
export async function grokSearch(
  query: string,
  endpoint: string,
  credential: string,
  options: SearchOptions = {},
): Promise<SearchResult> {
  const started = Date.now();
  const elapsed = () => Math.max(0, Date.now() - started);

  const baseUrl = normalizeEndpoint(endpoint);
  const apiKey = normalizeCredential(credential);
  if (!baseUrl || !apiKey) {
    return {
      ok: false,
      content: '',
      sources: [],
      raw: '',
      error: baseUrl ? MISSING_CREDENTIAL_ERROR : MISSING_ENDPOINT_ERROR,
      errorKind: 'configuration',
      elapsedMs: elapsed(),
      retries: 0,
    };
  }

  const request = buildChatRequest(query, baseUrl, apiKey, options);
  const timeoutSeconds = positiveOr(options.timeoutSeconds, DEFAULT_TIMEOUT_SECONDS);
  const retryableStatusCodes = options.retryableStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES;
  const debug = options.debug ?? process.env.DEBUG === '1';

  const run = await runWithRetry<AttemptReport>(
    (attempt, signal) => {
      if (debug) {
        console.error(`[grok-search] POST ${request.url} (attempt ${attempt + 1})`);
      }
      return attemptOnce(
        request,
        options.connection,
        timeoutSeconds,
        retryableStatusCodes,
        signal,
        debug,
      );
    },
    'grok_web_search',
    {
      maxRetries: Math.floor(nonNegativeOr(options.maxRetries, DEFAULT_MAX_RETRIES)),
      baseDelayMs: nonNegativeOr(options.retryDelaySeconds, DEFAULT_RETRY_DELAY_SECONDS) * 1000,
      signal: options.signal,
      debug,
    },
  );

  const report = run.value;
  if (!report.ok) {
    const error =
      run.exhausted && run.attempts > 1
        ? `${report.error} (after ${run.attempts} attempts)`
        : report.error;
    if (debug) {
      console.error(`[grok-search] Search failed: ${error}`);
    }
    return {
      ok: false,
      content: '',
      sources: [],
      raw: '',
      error,
      errorKind: report.kind,
      status: report.status,
      detail: report.detail || undefined,
      model: options.model || undefined,
      elapsedMs: elapsed(),
      retries: run.retries,
    };
  }

  const { content, sources, raw } = extract(report.message.content);
  return {
    ok: true,
    content,
    sources,
    raw,
    status: report.status,
    model: report.message.model || options.model || undefined,
    usage: report.message.usage,
    elapsedMs: elapsed(),
    retries: run.retries,
  };
}

export { grokSearch as search };

/**
 * Create a configured Grok search function with default settings
 *
 * @param defaults - Endpoint, credential and options applied to every call
 * @returns A search function with the defaults merged under per-call options
 */
export function createGrokSearcher(defaults: {
  endpoint: string;
  credential: string;
  options?: SearchOptions;
}): (query: string, options?: SearchOptions) => Promise<SearchResult> {
  return (query: string, options?: SearchOptions) =>
    grokSearch(query, defaults.endpoint, defaults.credential, {
      ...defaults.options,
      ...options,
    });
}
