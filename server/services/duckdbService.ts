import { DuckDBConnection, DuckDBInstance, DuckDBResultReader } from '@duckdb/node-api';
import { CellValue, QueryResult, Row, emptyResult } from '../../types';

/**
 * Converts an engine value into something JSON can carry.
 * BIGINTs stay numeric while they fit a safe integer; dates, decimals,
 * lists and structs fall back to the engine's own text form.
 */
export const normalizeValue = (value: unknown): CellValue => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'bigint') {
        const asNumber = Number(value);
        return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
    }
    // JSON has no NaN or Infinity
    if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    return String(value);
};

/** `SELECT *` over a join repeats names; later copies get `_1`, `_2`, ... */
export const uniqueColumnNames = (names: string[]): string[] => {
    const used = new Set<string>();
    return names.map(name => {
        let candidate = name;
        let suffix = 1;
        while (used.has(candidate)) {
            candidate = `${name}_${suffix++}`;
        }
        used.add(candidate);
        return candidate;
    });
};

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Owns the single read/write handle to the workshop database file.
 * The file is exclusively locked while open, so there is never more than
 * one instance per service and callers go through `exclusive` for anything
 * that must not interleave with a reset.
 */
export class DuckDBService {
    private instance: DuckDBInstance | null = null;
    private conn: DuckDBConnection | null = null;
    private connectPromise: Promise<DuckDBConnection> | null = null;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(private readonly databasePath: string) { }

    get path(): string {
        return this.databasePath;
    }

    get isOpen(): boolean {
        return this.conn !== null;
    }

    async getConnection(): Promise<DuckDBConnection> {
        if (this.conn) return this.conn;
        if (this.connectPromise) return this.connectPromise;

        this.connectPromise = (async () => {
            console.log(`[DuckDB] Opening ${this.databasePath} (read/write)`);
            const instance = await DuckDBInstance.create(this.databasePath, { access_mode: 'READ_WRITE' });
            let conn: DuckDBConnection;
            try {
                conn = await instance.connect();
            } catch (e) {
                // Release the file lock before giving up.
                instance.closeSync();
                throw e;
            }
            this.instance = instance;
            this.conn = conn;
            return conn;
        })();

        try {
            return await this.connectPromise;
        } finally {
            this.connectPromise = null;
        }
    }

    /** Runs tasks one after another; a failed task does not block the next. */
    exclusive<T>(task: () => Promise<T>): Promise<T> {
        const next = this.queue.then(task);
        this.queue = next.catch(() => undefined);
        return next;
    }

    /**
     * Executes SQL and throws whatever the engine throws. Several statements
     * run in order; the first failure stops the batch and the last
     * statement's rows are returned.
     */
    run(sql: string): Promise<QueryResult> {
        return this.exclusive(async () => {
            const conn = await this.getConnection();
            const started = performance.now();
            const extracted = await conn.extractStatements(sql);
            let reader: DuckDBResultReader | null = null;
            for (let i = 0; i < extracted.count; i++) {
                const prepared = await extracted.prepare(i);
                reader = await prepared.runAndReadAll();
            }
            if (!reader) return { ...emptyResult(), executionTime: performance.now() - started };

            const columns = uniqueColumnNames(reader.columnNames());
            const rows = reader.getRows().map(values => {
                // No prototype, so a column named __proto__ is an ordinary key.
                const row: Row = Object.create(null);
                columns.forEach((col, i) => {
                    row[col] = normalizeValue(values[i]);
                });
                return row;
            });
            return { columns, rows, executionTime: performance.now() - started };
        });
    }

    /**
     * Executes learner SQL. Never rejects: engine errors come back as an
     * empty result carrying the engine's message.
     */
    async execute(sql: string): Promise<QueryResult> {
        if (!sql.trim()) return emptyResult();
        try {
            return await this.run(sql);
        } catch (e) {
            const message = errorMessage(e);
            console.warn(`[DuckDB] Query failed: ${message}`);
            return emptyResult(`Error: ${message}`);
        }
    }

    /** Closes the current handles. Errors (e.g. already closed) are logged and dropped. */
    close(): void {
        try {
            this.conn?.closeSync();
        } catch (e) {
            console.warn('[DuckDB] Connection close warning:', errorMessage(e));
        }
        try {
            this.instance?.closeSync();
        } catch (e) {
            console.warn('[DuckDB] Instance close warning:', errorMessage(e));
        }
    }

    /** Forgets the memoized handles so the next access opens the file again. */
    invalidate(): void {
        this.conn = null;
        this.instance = null;
    }

    dispose(): void {
        this.close();
        this.invalidate();
    }
}
