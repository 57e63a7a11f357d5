import type { Express } from 'express';
import type { DuckDBService } from '../services/duckdbService';
import { exampleQueries } from '../../data/exampleQueries';

export function registerCatalogRoute(app: Express) {
  app.get('/api/catalog', (_req, res) => {
    res.json(exampleQueries);
  });
}

export function registerQueryRoute(app: Express, db: DuckDBService) {
  app.post('/api/query', async (req, res) => {
    const sql: unknown = req.body?.sql;
    if (typeof sql !== 'string') {
      res.status(400).json({ error: 'Body must be JSON with a string "sql" field' });
      return;
    }
    // Engine errors are part of the result, not an HTTP failure.
    res.json(await db.execute(sql));
  });
}
