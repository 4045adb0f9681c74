import { Router } from 'express';
import { MonitorService } from '@/services/monitor.service';
import { createMonitorController } from '@/controllers/monitor.controller';

export const createMonitorRouter = (monitor: MonitorService): Router => {
  const router = Router();
  const controller = createMonitorController(monitor);

  router.post('/readings', controller.ingestReading);
  router.get('/latest', controller.getLatest);
  router.get('/history', controller.getHistory);
  router.get('/status', controller.getStatus);
  router.post('/reset', controller.resetMonitor);

  return router;
};
