import { QueryResult, emptyResult } from '../../types';
import { DuckDBService } from './duckdbService';

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

/**
 * One batched statement counting every table. Names are quoted both ways:
 * learners can create tables with any name.
 */
export const buildRowCountQuery = (tables: string[]): string | null => {
    if (tables.length === 0) return null;
    const selects = tables.map(
        table => `SELECT ${quoteLiteral(table)} AS "Table Name", COUNT(1) AS "Row Count" FROM ${quoteIdentifier(table)}`
    );
    return `${selects.join('\nUNION ALL\n')}\nORDER BY "Table Name";`;
};

// Counts and column lookups use bare names, so only the default schema is listed.
const CURRENT_SCHEMA = 'table_catalog = current_database() AND table_schema = current_schema()';

export class SchemaInspector {
    constructor(private readonly db: DuckDBService) { }

    async listTables(): Promise<string[]> {
        const res = await this.db.execute(
            `SELECT DISTINCT table_name FROM information_schema.tables
WHERE ${CURRENT_SCHEMA}
ORDER BY table_name;`
        );
        if (res.error) console.warn(`[Schema] Table listing failed: ${res.error}`);
        return res.rows.map(r => String(r.table_name));
    }

    async getRowCounts(tables: string[]): Promise<QueryResult> {
        const sql = buildRowCountQuery(tables);
        if (!sql) return emptyResult();
        return this.db.execute(sql);
    }

    async listColumns(table: string): Promise<QueryResult> {
        return this.db.execute(`SELECT ordinal_position AS "Ordinal Position",
       column_name AS "Column Name",
       data_type AS "Data Type"
FROM information_schema.columns
WHERE ${CURRENT_SCHEMA} AND table_name = ${quoteLiteral(table)}
ORDER BY ordinal_position;`);
    }
}
