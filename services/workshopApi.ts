// Client for the workshop server (proxied to /api by Vite in development)
import { CatalogEntry, QueryResult, ResetReport, SchemaOverview } from '../types';

export class ApiError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface WorkshopClient {
  getCatalog(): Promise<CatalogEntry[]>;
  runQuery(sql: string): Promise<QueryResult>;
  getSchema(): Promise<SchemaOverview>;
  getColumns(table: string): Promise<QueryResult>;
  resetDatabase(): Promise<ResetReport>;
}

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class WorkshopApi implements WorkshopClient {
  constructor(private readonly baseUrl = '/api', private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)) { }

  private async request<T>(path: string, init?: RequestInit): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (e) {
      throw new ApiError(0, `Server unreachable: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!res.ok) {
      const body: unknown = await res.json().catch(() => null);
      const message = body && typeof body === 'object' && 'error' in body && typeof body.error === 'string'
        ? body.error
        : res.statusText || `HTTP ${res.status}`;
      throw new ApiError(res.status, message);
    }
    return res.json();
  }

  getCatalog() {
    return this.request<CatalogEntry[]>('/catalog');
  }

  runQuery(sql: string) {
    return this.request<QueryResult>('/query', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ sql }),
    });
  }

  getSchema() {
    return this.request<SchemaOverview>('/schema');
  }

  getColumns(table: string) {
    return this.request<QueryResult>(`/schema/${encodeURIComponent(table)}/columns`);
  }

  resetDatabase() {
    return this.request<ResetReport>('/reset', { method: 'POST' });
  }
}

export interface LoadedSchema {
  overview: SchemaOverview;
  reset: ResetReport | null;
}

/**
 * Fetches tables and row counts. An empty schema means the database file
 * is gone or blank: restore it and read the schema again.
 */
export async function loadSchemaOverview(client: Pick<WorkshopClient, 'getSchema' | 'resetDatabase'>): Promise<LoadedSchema> {
  const overview = await client.getSchema();
  if (overview.tables.length > 0) return { overview, reset: null };

  console.warn('[Schema] No tables found, resetting database');
  const reset = await client.resetDatabase();
  return { overview: await client.getSchema(), reset };
}

export const workshopApi = new WorkshopApi();
