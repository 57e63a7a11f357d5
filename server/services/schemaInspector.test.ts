import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { DuckDBService } from './duckdbService';
import { ResetController } from './resetController';
import { SchemaInspector, buildRowCountQuery, quoteIdentifier, quoteLiteral } from './schemaInspector';

const BACKUP_DIR = fileURLToPath(new URL('../../backup_data', import.meta.url));

describe('query building', () => {
    it('quotes identifiers and literals', () => {
        expect(quoteIdentifier('my "table"')).toBe('"my ""table"""');
        expect(quoteLiteral("o'brien")).toBe("'o''brien'");
    });

    it('builds one UNION ALL over every table', () => {
        expect(buildRowCountQuery(['customers', "o'brien"])).toBe(
            `SELECT 'customers' AS "Table Name", COUNT(1) AS "Row Count" FROM "customers"\n` +
            `UNION ALL\n` +
            `SELECT 'o''brien' AS "Table Name", COUNT(1) AS "Row Count" FROM "o'brien"\n` +
            `ORDER BY "Table Name";`
        );
    });

    it('builds nothing for an empty table list', () => {
        expect(buildRowCountQuery([])).toBeNull();
    });
});

describe('SchemaInspector', () => {
    let dir: string;
    let db: DuckDBService;
    let inspector: SchemaInspector;

    beforeAll(async () => {
        dir = mkdtempSync(path.join(tmpdir(), 'sql-workshop-'));
        db = new DuckDBService(path.join(dir, 'inspect.db'));
        inspector = new SchemaInspector(db);
        await new ResetController(db, BACKUP_DIR).reset();
    });

    afterAll(() => {
        db.dispose();
        rmSync(dir, { recursive: true, force: true });
    });

    it('lists tables alphabetically', async () => {
        expect(await inspector.listTables()).toEqual(['customers', 'lineitems', 'orders', 'products']);
    });

    it('counts every table in one batched query', async () => {
        const tables = await inspector.listTables();
        const counts = await inspector.getRowCounts(tables);

        expect(counts.error).toBeUndefined();
        expect(counts.columns).toEqual(['Table Name', 'Row Count']);
        expect(counts.rows).toEqual([
            { 'Table Name': 'customers', 'Row Count': 12 },
            { 'Table Name': 'lineitems', 'Row Count': 30 },
            { 'Table Name': 'orders', 'Row Count': 15 },
            { 'Table Name': 'products', 'Row Count': 8 },
        ]);
    });

    it('each batched count matches the single-table count', async () => {
        const tables = await inspector.listTables();
        const counts = await inspector.getRowCounts(tables);

        expect(counts.rows).toHaveLength(tables.length);
        for (const row of counts.rows) {
            const single = await db.execute(`SELECT COUNT(*) AS n FROM ${quoteIdentifier(String(row['Table Name']))};`);
            expect(single.rows[0].n).toBe(row['Row Count']);
        }
    });

    it('returns an empty result when there are no tables', async () => {
        const counts = await inspector.getRowCounts([]);
        expect(counts.rows).toEqual([]);
        expect(counts.error).toBeUndefined();
    });

    it('lists columns in ordinal order', async () => {
        const cols = await inspector.listColumns('customers');

        expect(cols.columns).toEqual(['Ordinal Position', 'Column Name', 'Data Type']);
        expect(cols.rows).toEqual([
            { 'Ordinal Position': 1, 'Column Name': 'customerid', 'Data Type': 'INTEGER' },
            { 'Ordinal Position': 2, 'Column Name': 'customername', 'Data Type': 'VARCHAR' },
            { 'Ordinal Position': 3, 'Column Name': 'company', 'Data Type': 'VARCHAR' },
            { 'Ordinal Position': 4, 'Column Name': 'email', 'Data Type': 'VARCHAR' },
            { 'Ordinal Position': 5, 'Column Name': 'city', 'Data Type': 'VARCHAR' },
        ]);
    });

    it('handles table names that need quoting', async () => {
        await db.execute(`CREATE TABLE "it's odd" AS SELECT 1 AS v UNION ALL SELECT 2;`);
        try {
            const tables = await inspector.listTables();
            expect(tables).toContain("it's odd");

            const counts = await inspector.getRowCounts(tables);
            expect(counts.rows).toContainEqual({ 'Table Name': "it's odd", 'Row Count': 2 });

            const cols = await inspector.listColumns("it's odd");
            expect(cols.rows).toEqual([{ 'Ordinal Position': 1, 'Column Name': 'v', 'Data Type': 'INTEGER' }]);
        } finally {
            await db.execute(`DROP TABLE "it's odd";`);
        }
    });

    it('ignores tables outside the default schema', async () => {
        await db.execute('CREATE SCHEMA side; CREATE TABLE side.extra (v INTEGER); CREATE TABLE side.customers (other VARCHAR);');
        try {
            const tables = await inspector.listTables();
            expect(tables).toEqual(['customers', 'lineitems', 'orders', 'products']);

            const counts = await inspector.getRowCounts(tables);
            expect(counts.error).toBeUndefined();
            expect(counts.rows).toHaveLength(4);

            const cols = await inspector.listColumns('customers');
            expect(cols.rows.map(r => r['Column Name'])).toEqual(['customerid', 'customername', 'company', 'email', 'city']);
        } finally {
            await db.execute('DROP SCHEMA side CASCADE;');
        }
    });
});
