import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServer, handleToolCall, type ServerDeps, validateQuery } from './server.js';
import type { SearchOptions, SearchResult } from './types.js';

function okResult(content: string): SearchResult {
  return {
    ok: true,
    content,
    sources: [{ url: 'https://a.example.com', title: 'A', snippet: '' }],
    raw: '',
    elapsedMs: 1,
    retries: 0,
  };
}

function makeDeps(result: SearchResult) {
  const search = vi.fn(async (_query: string, _options?: SearchOptions) => result);
  const deps: ServerDeps = {
    search,
    formatOptions: { showSources: false, maxSources: 5 },
  };
  return { deps, search };
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('validateQuery', () => {
  it('collapses whitespace', () => {
    expect(validateQuery('  latest\n\tnews  ')).toEqual({ valid: true, sanitized: 'latest news' });
  });

  it('rejects empty, non-string and oversized queries', () => {
    expect(validateQuery('   ')).toEqual({ valid: false, error: 'Query cannot be empty' });
    expect(validateQuery(undefined)).toEqual({ valid: false, error: 'Query cannot be empty' });
    expect(validateQuery('x'.repeat(4001))).toEqual({
      valid: false,
      error: 'Query too long: 4001 > 4000',
    });
  });
});

describe('handleToolCall', () => {
  it('runs the search with the sanitized query', async () => {
    const { deps, search } = makeDeps(okResult('Answer'));

    const result = await handleToolCall('grok_web_search', { query: ' what  is new ' }, deps);

    expect(search).toHaveBeenCalledWith('what is new', { signal: undefined });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Search results:\nAnswer' }],
      isError: false,
    });
  });

  it('marks failed searches as errors', async () => {
    const { deps } = makeDeps({
      ok: false,
      content: '',
      sources: [],
      raw: '',
      error: 'HTTP 429 - Rate limited, try again later (after 4 attempts)',
      errorKind: 'upstream_status',
      elapsedMs: 1,
      retries: 3,
    });

    const result = await handleToolCall('grok_web_search', { query: 'q' }, deps);

    expect(result).toEqual({
      content: [
        { type: 'text', text: 'Search failed: HTTP 429 - Rate limited, try again later (after 4 attempts)' },
      ],
      isError: true,
    });
  });

  it('rejects unknown tools and missing queries without searching', async () => {
    const { deps, search } = makeDeps(okResult('Answer'));

    expect(await handleToolCall('other_tool', { query: 'q' }, deps)).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool "other_tool"' }],
      isError: true,
    });
    expect(await handleToolCall('grok_web_search', undefined, deps)).toEqual({
      content: [{ type: 'text', text: 'Error: Query cannot be empty' }],
      isError: true,
    });
    expect(search).not.toHaveBeenCalled();
  });

  it('passes the abort signal to the search', async () => {
    const { deps, search } = makeDeps(okResult('Answer'));
    const controller = new AbortController();

    await handleToolCall('grok_web_search', { query: 'q' }, deps, controller.signal);

    expect(search).toHaveBeenCalledWith('q', { signal: controller.signal });
  });
});

describe('createServer', () => {
  it('serves the tool over MCP', async () => {
    const { deps } = makeDeps(okResult('Answer'));
    const server = createServer(deps);
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual(['grok_web_search']);

    const result = await client.callTool({ name: 'grok_web_search', arguments: { query: 'q' } });
    expect(result.isError).toBe(false);
    expect(result.content).toEqual([{ type: 'text', text: 'Search results:\nAnswer' }]);

    await client.close();
    await server.close();
  });

  it('aborts the search when the client cancels the call', async () => {
    let searchStarted: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      searchStarted = resolve;
    });
    const seen: Array<AbortSignal | undefined> = [];
    const search = vi.fn(
      (_query: string, options?: SearchOptions) =>
        new Promise<SearchResult>((_resolve, reject) => {
          seen.push(options?.signal);
          options?.signal?.addEventListener('abort', () => reject(new Error('search aborted')));
          searchStarted();
        }),
    );
    const server = createServer({ search, formatOptions: { showSources: false, maxSources: 5 } });
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const controller = new AbortController();
    const call = client.callTool({ name: 'grok_web_search', arguments: { query: 'q' } }, undefined, {
      signal: controller.signal,
    });
    await started;
    controller.abort(new Error('cancelled by client'));

    await expect(call).rejects.toThrow('cancelled by client');
    await vi.waitFor(() => expect(seen[0]?.aborted).toBe(true));
    expect(search).toHaveBeenCalledTimes(1);

    await client.close();
    await server.close();
  });
});
