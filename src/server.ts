import { ScheduledTask } from 'node-cron';
import { createApp } from './app';
import Config from '@/config/index';
import { createMonitorFromConfig } from '@/services/monitor.service';
import { startSensorPollingJob } from '@/jobs/sensor-polling.job';
import { logger } from '@/utils/logger';

function startServer() {
  try {
    const monitor = createMonitorFromConfig();
    const status = monitor.getStatus();
    logger.info(`✓ Monitoring ${status.product} (${status.mode}, window ${status.window_size})`);

    let pollingTask: ScheduledTask | undefined;
    if (Config.SENSOR.ENDPOINT_URL) {
      pollingTask = startSensorPollingJob(monitor, {
        endpointUrl: Config.SENSOR.ENDPOINT_URL,
        schedule: Config.SENSOR.POLL_SCHEDULE,
        timeoutMs: Config.SENSOR.TIMEOUT_MS,
        exportDir: Config.EXPORT.DIR,
        exportEvery: Config.EXPORT.EVERY,
      });
      logger.info('✓ Sensor polling job started');
    } else {
      logger.warn('⚠ SENSOR_ENDPOINT_URL not configured - readings only arrive over HTTP');
    }

    // Start Express server
    const server = createApp(monitor).listen(Config.PORT, () => {
      logger.info(`✓ Server running on port ${Config.PORT}`);
    });

    // Graceful shutdown
    process.on('SIGINT', () => {
      logger.info('Shutting down gracefully...');
      pollingTask?.stop();
      server.close(() => {
        process.exit(0);
      });
    });

  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

startServer();
