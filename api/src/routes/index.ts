import { Router } from 'express';
import type { BattleService } from '../services/battleService';
import { battlesRouter } from './battles';
import { rankingsRouter } from './rankings';

export function apiRouter(service: BattleService): Router {
  const router = Router();
  router.use('/battles', battlesRouter(service));
  router.use('/rankings', rankingsRouter(service));
  return router;
}
