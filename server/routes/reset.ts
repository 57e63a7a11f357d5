import type { Express } from 'express';
import type { ResetController } from '../services/resetController';

export function registerResetRoute(app: Express, resetController: ResetController) {
  app.post('/api/reset', async (_req, res, next) => {
    try {
      res.json(await resetController.reset());
    } catch (err) {
      next(err);
    }
  });
}
