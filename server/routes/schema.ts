import type { Express } from 'express';
import type { SchemaInspector } from '../services/schemaInspector';
import { SchemaOverview } from '../../types';

export function registerSchemaRoutes(app: Express, inspector: SchemaInspector) {
  app.get('/api/schema', async (_req, res, next) => {
    try {
      const tables = await inspector.listTables();
      const overview: SchemaOverview = {
        tables,
        rowCounts: await inspector.getRowCounts(tables),
      };
      res.json(overview);
    } catch (err) {
      next(err);
    }
  });

  app.get('/api/schema/:table/columns', async (req, res, next) => {
    try {
      res.json(await inspector.listColumns(req.params.table));
    } catch (err) {
      next(err);
    }
  });
}
