import { missingConfig, type SearchConfig } from '../config.js';
import { debugRequest, type LogFn } from './debug.js';
import { ConfigurationError, RemoteQueryError, type SearchResult } from './errors.js';
import type { SearchHttpResponse, SearchTransport } from './http-transport.js';

const DEFAULT_TOP = 50;

export interface SearchQuery {
  searchText?: string;
  filter?: string;
  top?: number;
}

interface SearchRequestBody {
  top: number;
  select: string;
  search: string;
  filter?: string;
}

interface DeleteAction {
  '@search.action': 'delete';
  id: string;
}

// A search hit, keys kept in the order they were serialized.
type SearchRecord = Record<string, unknown>;

interface Target {
  baseUrl: string;
  headers: Record<string, string>;
}

export interface SearchClient {
  searchDocIds(query?: SearchQuery): Promise<SearchResult<string[]>>;
  deleteDocuments(ids: string[]): Promise<SearchResult<SearchHttpResponse, ConfigurationError>>;
}

function resolveTarget(config: SearchConfig): SearchResult<Target, ConfigurationError> {
  const missing = missingConfig(config);
  if (missing.length > 0 || !config.endpoint || !config.apiKey || !config.indexName) {
    return { ok: false, error: new ConfigurationError(missing) };
  }

  return {
    ok: true,
    value: {
      baseUrl: `${config.endpoint.replace(/\/+$/, '')}/indexes/${config.indexName}/docs`,
      headers: { 'Content-Type': 'application/json', 'api-key': config.apiKey },
    },
  };
}

// Strings pass through and numbers are stringified; null, objects and arrays are not keys.
function toDocId(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Picks the key of a search hit: the `id` field when present, else whatever field came first.
 * "First" is the parsed object's key order, which puts integer-like field names ahead of the rest.
 */
export function extractDocId(record: SearchRecord): string | undefined {
  if ('id' in record) return toDocId(record.id);
  const [first] = Object.keys(record);
  return first === undefined ? undefined : toDocId(record[first]);
}

function isRecord(value: unknown): value is SearchRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSearchHits(body: string): string[] {
  const data: unknown = JSON.parse(body);
  const hits = isRecord(data) && Array.isArray(data.value) ? data.value : [];

  const ids: string[] = [];
  for (const hit of hits) {
    if (!isRecord(hit)) continue;
    const id = extractDocId(hit);
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

export function createSearchClient(
  config: SearchConfig,
  transport: SearchTransport,
  log: LogFn = console.log,
): SearchClient {
  return {
    /**
     * Runs one search page and returns the ids of the hits, in result order.
     * A missing search text means everything (`*`). The filter is sent as given.
     */
    async searchDocIds({ searchText, filter, top = DEFAULT_TOP } = {}) {
      const target = resolveTarget(config);
      if (!target.ok) return target;

      const url = `${target.value.baseUrl}/search?api-version=${config.apiVersion}`;
      const body: SearchRequestBody = { top, select: 'id', search: searchText ?? '*' };
      if (filter) body.filter = filter;

      if (config.debug) debugRequest(log, 'SEARCH POST', url, target.value.headers, 'body', body);

      const res = await transport.post(url, target.value.headers, body);
      if (res.status !== 200) {
        return { ok: false, error: new RemoteQueryError(res.status, res.body) };
      }
      return { ok: true, value: parseSearchHits(res.body) };
    },

    /**
     * Sends one batch of delete actions. The response comes back as-is, whatever its status.
     */
    async deleteDocuments(ids) {
      const target = resolveTarget(config);
      if (!target.ok) return target;

      const url = `${target.value.baseUrl}/index?api-version=${config.apiVersion}`;
      const actions: DeleteAction[] = ids.map((id) => ({ '@search.action': 'delete', id }));
      const body = { value: actions };

      if (config.debug) debugRequest(log, 'POST', url, target.value.headers, 'payload', body);

      const res = await transport.post(url, target.value.headers, body);
      return { ok: true, value: res };
    },
  };
}
