import { rm } from 'node:fs/promises';
import { DuckDBConnection } from '@duckdb/node-api';
import { ResetReport } from '../../types';
import { DuckDBService } from './duckdbService';
import { SchemaInspector, quoteLiteral } from './schemaInspector';

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Rebuilds the workshop database from the canonical export in `backupDir`.
 * Every step runs even when the one before it failed; failures end up in
 * the report's warnings.
 */
export class ResetController {
    private readonly inspector: SchemaInspector;

    constructor(private readonly db: DuckDBService, private readonly backupDir: string) {
        this.inspector = new SchemaInspector(db);
    }

    async reset(): Promise<ResetReport> {
        console.log(`[Reset] Restoring ${this.db.path} from ${this.backupDir}`);
        const warnings = await this.db.exclusive(() => this.rebuild());

        const tables = await this.inspector.listTables();
        const restored = tables.length > 0;
        if (restored) {
            console.log(`[Reset] Restored ${tables.length} table(s): ${tables.join(', ')}`);
        } else {
            console.error('[Reset] Database is still empty after restore', warnings);
        }
        return { restored, tables, warnings };
    }

    private async rebuild(): Promise<string[]> {
        const warnings: string[] = [];

        this.db.close();

        for (const file of [this.db.path, `${this.db.path}.wal`]) {
            try {
                await rm(file, { force: true });
            } catch (e) {
                warnings.push(`Could not delete ${file}: ${errorMessage(e)}`);
            }
        }

        this.db.invalidate();

        let conn: DuckDBConnection | null = null;
        try {
            conn = await this.db.getConnection();
        } catch (e) {
            warnings.push(`Could not reopen database: ${errorMessage(e)}`);
        }

        if (conn) {
            try {
                await conn.run(`IMPORT DATABASE ${quoteLiteral(this.backupDir)};`);
            } catch (e) {
                warnings.push(`Import failed: ${errorMessage(e)}`);
            }
        }

        for (const w of warnings) console.warn(`[Reset] ${w}`);
        return warnings;
    }
}
