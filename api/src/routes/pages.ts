import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { HttpError, NoSubmissionsError } from '../errors';
import { logger } from '../logger';
import type { BattleService } from '../services/battleService';
import { DEFAULT_FORM, renderBattlePage } from '../views/battlePage';
import { MAX_CODE_LENGTH, MAX_NAME_LENGTH } from './limits';

const battleFormSchema = z.object({
  devA: z.string().max(MAX_NAME_LENGTH).default(DEFAULT_FORM.devA),
  devB: z.string().max(MAX_NAME_LENGTH).default(DEFAULT_FORM.devB),
  codeA: z.string().max(MAX_CODE_LENGTH).default(''),
  codeB: z.string().max(MAX_CODE_LENGTH).default(''),
});

export function pagesRouter(service: BattleService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.type('html').send(renderBattlePage({ form: DEFAULT_FORM }));
  });

  // POST /battle: the form submit
  router.post('/battle', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = battleFormSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const validationErrors = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        logger.warn({ module: 'routes.pages', validation_errors: validationErrors }, 'Validation error');
        throw new HttpError(400, `Invalid battle form: ${validationErrors.join('; ')}`);
      }

      const form = parsed.data;
      try {
        const report = await service.fight(
          { name: form.devA, code: form.codeA },
          { name: form.devB, code: form.codeB },
        );
        res.type('html').send(renderBattlePage({ form, report }));
      } catch (err) {
        if (!(err instanceof NoSubmissionsError)) throw err;
        logger.info({ module: 'routes.pages', dev_a: form.devA, dev_b: form.devB }, 'Empty battle form');
        res.type('html').send(renderBattlePage({ form, warning: err.message }));
      }
    } catch (err) {
      next(err);
    }
  });

  return router;
}
