import dayjs from 'dayjs';
import { Router } from 'express';
import { toAdviceRecordDTO } from '../../application/dto/AdviceRecordDTO.js';
import { NotFoundError } from '../../domain/errors/AppError.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

export const advisorRouter = (container: AppContainer): Router => {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: dayjs().toISOString() });
  });

  router.post('/advise', async (req, res, next) => {
    try {
      const record = await container.advicePipeline.run(req.body);
      res.json(toAdviceRecordDTO(record));
    } catch (error) {
      next(error);
    }
  });

  router.get('/history', async (_req, res, next) => {
    try {
      const records = await container.history.listAll();
      res.json(records.map(toAdviceRecordDTO));
    } catch (error) {
      next(error);
    }
  });

  router.post('/compare', async (req, res, next) => {
    try {
      const records = await container.compareService.compare(req.body);
      res.json(records.map(toAdviceRecordDTO));
    } catch (error) {
      next(error);
    }
  });

  router.use((req, _res, next) => {
    next(new NotFoundError(`No advisor endpoint for ${req.method} ${req.baseUrl}${req.path}`));
  });

  return router;
};
