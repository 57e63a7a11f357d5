// Shared shapes between the workshop server and the page.

export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export interface QueryResult {
  columns: string[];
  rows: Row[];
  executionTime: number;
  error?: string;
}

export interface CatalogEntry {
  name: string;
  sql: string;
}

export interface SchemaOverview {
  tables: string[];
  rowCounts: QueryResult;
}

export interface ResetReport {
  restored: boolean;
  tables: string[];
  warnings: string[];
}

export interface HealthStatus {
  ok: boolean;
  database: string;
}

export type ChartType = 'line' | 'bar' | 'scatter' | 'area';

export interface ChartConfig {
  type: ChartType;
  xKey: string;
  yKey: string;
}

export interface ChartPoint {
  x: number;
  y: number;
}

export type ChartSeries =
  | { kind: 'indexed'; labels: string[]; values: (number | null)[] }
  | { kind: 'pairs'; points: ChartPoint[] };

export type ChartBuildResult =
  | { ok: true; series: ChartSeries }
  | { ok: false; message: string };

export const emptyResult = (error?: string): QueryResult => ({
  columns: [],
  rows: [],
  executionTime: 0,
  ...(error ? { error } : {}),
});
