import type { Express } from 'express';
import type { DuckDBService } from '../services/duckdbService';
import { HealthStatus } from '../../types';

export function registerHealthRoute(app: Express, db: DuckDBService) {
  app.get('/api/health', async (_req, res) => {
    const probe = await db.execute('SELECT 1 AS ok');
    const status: HealthStatus = { ok: !probe.error, database: db.path };
    res.status(status.ok ? 200 : 503).json(status);
  });
}
