import 'dotenv/config';
import path from 'node:path';

export interface WorkshopConfig {
    port: number;
    databasePath: string;
    backupDir: string;
    corsOrigin: string | null;
}

const parsePort = (raw: string | undefined, fallback: number): number => {
    const port = Number(raw);
    return Number.isInteger(port) && port > 0 ? port : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): WorkshopConfig => ({
    port: parsePort(env.PORT, 3001),
    databasePath: path.resolve(env.DATABASE_PATH || 'sample.db'),
    backupDir: path.resolve(env.BACKUP_DIR || 'backup_data'),
    corsOrigin: env.CORS_ORIGIN || null,
});
