import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import Config from '@/config/index';
import { errorHandler } from '@/middleware/errorHandler';
import { MonitorService } from '@/services/monitor.service';
import { createMonitorRouter } from '@/routes/monitor.routes';
import { createProfileRouter } from '@/routes/profile.routes';

export const createApp = (monitor: MonitorService): Express => {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10kb' }));
  app.use(helmet());
  app.use(cors({ origin: Config.ALLOWED_ORIGINS.length > 0 ? Config.ALLOWED_ORIGINS : undefined }));

  // Routes
  app.use('/api/v1/monitor', createMonitorRouter(monitor));
  app.use('/api/v1/profiles', createProfileRouter(monitor.catalog));

  // Health check
  app.get('/health', (_req, res) => {
    const status = monitor.getStatus();
    res.json({
      status: 'ok',
      product: status.product,
      risk_level: status.risk_level,
      processed: status.processed,
      timestamp: new Date().toISOString(),
    });
  });

  // Error Handler
  app.use(errorHandler);

  return app;
};
