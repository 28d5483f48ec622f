import type { FilterSet } from '../query/filters';
import type { StringProperties } from '../types';

const DEFAULT_BASE_URL = 'http://localhost:8080';

type FetchImpl = typeof fetch;

export interface StringsClientOptions {
  baseUrl?: string;
  fetch?: FetchImpl;
}

export type StringPropertiesJson = Omit<StringProperties, 'character_frequency_map'> & {
  character_frequency_map: Record<string, number>;
};

/** Wire shape of a stored string; timestamps arrive as ISO-8601 text. */
export interface StringRecordJson {
  id: string;
  value: string;
  properties: StringPropertiesJson;
  created_at: string;
}

export interface ListResponse {
  data: StringRecordJson[];
  count: number;
  filters_applied: FilterSet;
}

export interface NaturalLanguageResponse {
  data: StringRecordJson[];
  count: number;
  interpreted_query: {
    original: string;
    parsed_filters: FilterSet;
  };
}

interface ErrorBody {
  error?: string;
  detail?: string;
}

/** Non-2xx response that the client does not translate into a return value. */
export class StringsApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string | undefined,
    detail: string | undefined,
  ) {
    super(`strings api error: ${status}${code ? ` ${code}` : ''}${detail ? ` - ${detail}` : ''}`);
    this.name = 'StringsApiError';
  }
}

export interface StringsClient {
  create(value: string): Promise<StringRecordJson>;
  /** Null when the value is not stored. */
  get(value: string): Promise<StringRecordJson | null>;
  list(filters?: FilterSet): Promise<ListResponse>;
  filterByNaturalLanguage(query: string): Promise<NaturalLanguageResponse>;
  /** False when the value was not stored. */
  delete(value: string): Promise<boolean>;
}

export function createStringsClient(options: StringsClientOptions = {}): StringsClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createStringsClient: fetch implementation required (pass options.fetch)');
  }
  const boundFetch: FetchImpl = fetchImpl.bind ? fetchImpl.bind(globalThis) : fetchImpl;

  const valueUrl = (value: string) => `${baseUrl}/strings/${encodeURIComponent(value)}`;

  return {
    async create(value) {
      const res = await boundFetch(`${baseUrl}/strings`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ value }),
      });
      if (!res.ok) throw await toApiError(res);
      return (await res.json()) as StringRecordJson;
    },

    async get(value) {
      const res = await boundFetch(valueUrl(value), { method: 'GET' });
      if (res.status === 404) return null;
      if (!res.ok) throw await toApiError(res);
      return (await res.json()) as StringRecordJson;
    },

    async list(filters = {}) {
      const search = toSearchParams(filters);
      const qs = search.toString();
      const res = await boundFetch(`${baseUrl}/strings${qs ? `?${qs}` : ''}`, { method: 'GET' });
      if (!res.ok) throw await toApiError(res);
      return (await res.json()) as ListResponse;
    },

    async filterByNaturalLanguage(query) {
      const search = new URLSearchParams({ query });
      const res = await boundFetch(`${baseUrl}/strings/filter-by-natural-language?${search.toString()}`, {
        method: 'GET',
      });
      if (!res.ok) throw await toApiError(res);
      return (await res.json()) as NaturalLanguageResponse;
    },

    async delete(value) {
      const res = await boundFetch(valueUrl(value), { method: 'DELETE' });
      if (res.status === 404) return false;
      if (!res.ok) throw await toApiError(res);
      return true;
    },
  };
}

function toSearchParams(filters: FilterSet): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    search.set(key, String(value));
  }
  return search;
}

async function toApiError(res: Response): Promise<StringsApiError> {
  const body = await safeReadErrorBody(res);
  return new StringsApiError(res.status, body.error, body.detail);
}

async function safeReadErrorBody(res: Response): Promise<ErrorBody> {
  try {
    const parsed: unknown = JSON.parse(await res.text());
    return typeof parsed === 'object' && parsed !== null ? (parsed as ErrorBody) : {};
  } catch {
    return {};
  }
}
