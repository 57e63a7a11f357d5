import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { exampleQueries } from '../../data/exampleQueries';
import { DuckDBService } from './duckdbService';
import { ResetController } from './resetController';
import { SchemaInspector } from './schemaInspector';

const BACKUP_DIR = fileURLToPath(new URL('../../backup_data', import.meta.url));

const CANONICAL_COUNTS: Record<string, number> = {
    customers: 12,
    lineitems: 30,
    orders: 15,
    products: 8,
};

const catalogSql = (name: string): string => {
    const entry = exampleQueries.find(e => e.name === name);
    if (!entry) throw new Error(`No example named ${name}`);
    return entry.sql;
};

describe('ResetController', () => {
    let dir: string;
    let dbPath: string;
    let db: DuckDBService;
    let controller: ResetController;
    let inspector: SchemaInspector;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'sql-workshop-'));
        dbPath = path.join(dir, 'sample.db');
        db = new DuckDBService(dbPath);
        controller = new ResetController(db, BACKUP_DIR);
        inspector = new SchemaInspector(db);
    });

    afterEach(() => {
        db.dispose();
        rmSync(dir, { recursive: true, force: true });
    });

    it('restores the canonical tables when the file is absent', async () => {
        expect(existsSync(dbPath)).toBe(false);

        const report = await controller.reset();

        expect(report).toEqual({
            restored: true,
            tables: ['customers', 'lineitems', 'orders', 'products'],
            warnings: [],
        });
        expect(existsSync(dbPath)).toBe(true);
    });

    it('reloads the known row counts', async () => {
        await controller.reset();

        for (const [table, count] of Object.entries(CANONICAL_COUNTS)) {
            const res = await db.execute(`SELECT COUNT(*) AS n FROM ${table};`);
            expect(res.rows).toEqual([{ n: count }]);
        }
    });

    it('converges to the same state when called repeatedly', async () => {
        const first = await controller.reset();
        await db.execute('DROP TABLE products;');
        await db.execute('CREATE TABLE scratch AS SELECT 1 AS x;');
        const second = await controller.reset();

        expect(second).toEqual(first);
        expect(await inspector.listTables()).toEqual(['customers', 'lineitems', 'orders', 'products']);
    });

    it('brings back a deleted customer', async () => {
        await controller.reset();
        const select = 'SELECT * FROM customers WHERE customerid = 501;';

        await db.execute(catalogSql('Delete Customer'));
        expect((await db.execute(select)).rows).toEqual([]);

        await controller.reset();
        const restored = await db.execute(select);
        expect(restored.rows).toEqual([{
            customerid: 501,
            customername: 'Alice Martin',
            company: 'AdventureWorks',
            email: 'alice.martin@example.com',
            city: 'Seattle',
        }]);
    });

    it('heals a database whose tables were all dropped', async () => {
        await controller.reset();
        for (const table of Object.keys(CANONICAL_COUNTS)) {
            await db.execute(`DROP TABLE ${table};`);
        }
        expect(await inspector.listTables()).toEqual([]);

        const report = await controller.reset();
        expect(report.restored).toBe(true);
        expect(await inspector.listTables()).toEqual(Object.keys(CANONICAL_COUNTS));
    });

    it('runs queued resets and queries in call order', async () => {
        const count = 'SELECT COUNT(*) AS n FROM customers;';

        const [firstReset, before, secondReset, deleted, after] = await Promise.all([
            controller.reset(),
            db.execute(count),
            controller.reset(),
            db.execute('DELETE FROM customers;'),
            db.execute(count),
        ]);

        expect(firstReset.restored).toBe(true);
        expect(before.rows).toEqual([{ n: 12 }]);
        expect(secondReset.restored).toBe(true);
        expect(deleted.rows).toEqual([{ Count: 12 }]);
        expect(after.rows).toEqual([{ n: 0 }]);
    });

    it('reports a warning when the backup directory is missing', async () => {
        const broken = new ResetController(db, path.join(dir, 'no-such-backup'));

        const report = await broken.reset();

        expect(report.restored).toBe(false);
        expect(report.tables).toEqual([]);
        expect(report.warnings).toHaveLength(1);
        expect(report.warnings[0]).toMatch(/^Import failed: /);
    });
});

describe('example queries against the canonical database', () => {
    let dir: string;
    let db: DuckDBService;

    beforeEach(async () => {
        dir = mkdtempSync(path.join(tmpdir(), 'sql-workshop-'));
        db = new DuckDBService(path.join(dir, 'sample.db'));
        await new ResetController(db, BACKUP_DIR).reset();
    });

    afterEach(() => {
        db.dispose();
        rmSync(dir, { recursive: true, force: true });
    });

    it('has unique names', () => {
        const names = exampleQueries.map(e => e.name);
        expect(new Set(names).size).toBe(names.length);
    });

    it('Count Orders returns one row with the order count', async () => {
        const res = await db.execute(catalogSql('Count Orders'));

        expect(res.columns).toHaveLength(1);
        expect(res.rows).toHaveLength(1);
        expect(res.rows[0][res.columns[0]]).toBe(15);
    });

    it('Filter Customers matches an independent count', async () => {
        const res = await db.execute(catalogSql('Filter Customers'));
        const count = await db.execute("SELECT COUNT(*) AS n FROM customers WHERE company = 'AdventureWorks';");

        expect(res.rows).toHaveLength(4);
        expect(count.rows[0].n).toBe(4);
    });

    it('Search Customers uses the pattern', async () => {
        const res = await db.execute(catalogSql('Search Customers'));
        expect(res.rows.map(r => r.customername)).toEqual(['Bruno Diaz', 'Farid Haddad', 'Jonas Berg']);
    });

    it('Select OrderDetails lists the items of order 9', async () => {
        const res = await db.execute(catalogSql('Select OrderDetails'));
        expect(res.rows).toHaveLength(3);
        expect(res.columns).toContain('profit');
    });

    it('High Revenue Companies keeps the groups above the threshold', async () => {
        const res = await db.execute(catalogSql('High Revenue Companies'));

        expect(res.error).toBeUndefined();
        expect(res.rows.map(r => [r.company, r.order_count])).toEqual([
            ['AdventureWorks', 6],
            ['Contoso', 4],
        ]);
    });

    it('List Profitable Customers is capped and ordered', async () => {
        const res = await db.execute(catalogSql('List Profitable Customers'));

        expect(res.rows).toHaveLength(5);
        expect(res.rows.map(r => r.customername)).toEqual(['Dev Patel', 'Hiro Tanaka', 'Bruno Diaz', 'Elena Rossi', 'Jonas Berg']);
    });

    it('every read-only example runs without error', async () => {
        for (const entry of exampleQueries.filter(e => /^\s*select/i.test(e.sql))) {
            const res = await db.execute(entry.sql);
            expect(res.error, entry.name).toBeUndefined();
        }
    });

    it('Insert Customer fails the second time on the primary key', async () => {
        const first = await db.execute(catalogSql('Insert Customer'));
        expect(first.error).toBeUndefined();

        const second = await db.execute(catalogSql('Insert Customer'));
        expect(second.rows).toEqual([]);
        expect(second.error).toMatch(/constraint/i);
    });
});
