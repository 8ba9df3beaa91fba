import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../logger';
import type { BattleService } from '../services/battleService';
import { MAX_CODE_LENGTH, MAX_NAME_LENGTH } from './limits';

const developerSchema = (defaultName: string) =>
  z
    .object({
      name: z.string().max(MAX_NAME_LENGTH).default(defaultName),
      code: z.string().max(MAX_CODE_LENGTH).default(''),
    })
    .default({});

export const battleRequestSchema = z.object({
  developerA: developerSchema('Developer A'),
  developerB: developerSchema('Developer B'),
});

export function battlesRouter(service: BattleService): Router {
  const router = Router();

  // POST /api/v1/battles
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = battleRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const validationErrors = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        logger.warn({ module: 'routes.battles', validation_errors: validationErrors }, 'Validation error');
        return res.status(400).json({ error: { message: validationErrors.join('; '), type: 'ValidationError' } });
      }

      const { developerA, developerB } = parsed.data;
      const report = await service.fight(developerA, developerB);
      res.status(201).json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
