import { Router, Request, Response, NextFunction } from 'express';
import type { BattleService } from '../services/battleService';

export function rankingsRouter(service: BattleService): Router {
  const router = Router();

  // GET /api/v1/rankings
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await service.leaderboard() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
