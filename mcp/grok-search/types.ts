/**
 * A cited reference attached to a synthesized answer
 */
export interface Source {
  url: string;
  title: string;
  snippet: string;
}

/**
 * Token accounting reported by the endpoint
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Failure classes surfaced through SearchResult.errorKind
 *
 * - configuration: missing/placeholder endpoint or credential, never retried
 * - transport: connection failure or timeout, retried
 * - upstream_status: non-200 response, retried when the status is retryable
 * - upstream_payload: 200 response that does not decode into a message
 */
export type SearchErrorKind =
  | 'configuration'
  | 'transport'
  | 'upstream_status'
  | 'upstream_payload';

/**
 * Result of a web search call. Every front end formats this one shape.
 */
export interface SearchResult {
  ok: boolean;
  /** Synthesized answer (empty on failure) */
  content: string;
  /** Deduplicated by URL, in discovery order */
  sources: Source[];
  /** Assistant text kept verbatim when it was not the requested JSON object */
  raw: string;
  /** Present iff ok=false */
  error?: string;
  errorKind?: SearchErrorKind;
  /** HTTP status of the last response received, if any */
  status?: number;
  /** Diagnostic body for failures, capped at 2000 characters */
  detail?: string;
  model?: string;
  usage?: TokenUsage;
  elapsedMs: number;
  retries: number;
}

/**
 * The assistant reply, independent of the wire encoding that carried it
 */
export interface CanonicalMessage {
  content: string;
  model: string;
  usage?: TokenUsage;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A reusable HTTP handle. The pipeline never closes one it did not open.
 */
export interface Connection {
  readonly closed: boolean;
  fetch(url: string, init: RequestInit): Promise<Response>;
  close(): Promise<void>;
}

/**
 * Options accepted by grokSearch
 */
export interface SearchOptions {
  /** Model name; omitted or empty lets the endpoint pick its default */
  model?: string;
  /** Per-attempt timeout in seconds (default: 60) */
  timeoutSeconds?: number;
  /** Request high reasoning effort (default: true) */
  enableThinking?: boolean;
  /** Reasoning token budget, sent only when positive (default: 32000) */
  thinkingBudgetTokens?: number;
  extraBody?: Record<string, unknown>;
  extraHeaders?: Record<string, unknown>;
  /** Caller-owned connection reused across calls */
  connection?: Connection;
  /** Replaces the default system prompt, even when empty */
  systemPrompt?: string;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base backoff delay in seconds (default: 1.0) */
  retryDelaySeconds?: number;
  retryableStatusCodes?: ReadonlySet<number>;
  /** Aborting cancels the in-flight attempt or pending backoff */
  signal?: AbortSignal;
  /** Trace attempts to stderr (default: DEBUG=1) */
  debug?: boolean;
}
