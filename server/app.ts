import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { WorkshopConfig } from './config';
import { DuckDBService } from './services/duckdbService';
import { SchemaInspector } from './services/schemaInspector';
import { ResetController } from './services/resetController';
import { registerCatalogRoute, registerQueryRoute } from './routes/query';
import { registerSchemaRoutes } from './routes/schema';
import { registerResetRoute } from './routes/reset';
import { registerHealthRoute } from './routes/health';

export interface WorkshopServices {
  db: DuckDBService;
  inspector: SchemaInspector;
  resetController: ResetController;
}

export const createServices = (config: WorkshopConfig): WorkshopServices => {
  const db = new DuckDBService(config.databasePath);
  return {
    db,
    inspector: new SchemaInspector(db),
    resetController: new ResetController(db, config.backupDir),
  };
};

/** 4xx status set by body-parser (malformed JSON, oversized body), if any. */
const clientErrorStatus = (err: unknown): number | null => {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
};

export function createApp(services: WorkshopServices, corsOrigin: string | null = null) {
  const app = express();

  if (corsOrigin) app.use(cors({ origin: corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  registerCatalogRoute(app);
  registerQueryRoute(app, services.db);
  registerSchemaRoutes(app, services.inspector);
  registerResetRoute(app, services.resetController);
  registerHealthRoute(app, services.db);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    const status = clientErrorStatus(err);
    if (status) {
      console.warn(`[API] Rejected request (${status}): ${message}`);
      res.status(status).json({ error: message });
      return;
    }
    console.error('[API] Unhandled error:', message);
    res.status(500).json({ error: message });
  });

  return app;
}
