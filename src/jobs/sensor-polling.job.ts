import cron, { ScheduledTask } from 'node-cron';
import path from 'path';
import { MonitorService } from '@/services/monitor.service';
import { fetchSensorReading } from '@/services/sensor-poller.service';
import { writeResultsCsv } from '@/services/result-export.service';
import { SpoilageError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface SensorPollingOptions {
  endpointUrl: string;
  schedule: string;
  timeoutMs: number;
  exportDir: string;
  exportEvery: number;
}

export interface PollState {
  step: number;
  ingested: number;
}

/**
 * One polling tick: fetch, score, and export the history every
 * `exportEvery` ingested readings (0 disables exports).
 */
export async function pollOnce(monitor: MonitorService, options: SensorPollingOptions, state: PollState): Promise<boolean> {
  state.step++;
  const reading = await fetchSensorReading(options.endpointUrl, {
    timeoutMs: options.timeoutMs,
    product: monitor.getStatus().product,
    fallbackTs: state.step
  });
  if (!reading) {
    return false;
  }

  try {
    monitor.ingest(reading);
  } catch (error) {
    if (error instanceof SpoilageError) {
      return false;
    }
    throw error;
  }
  state.ingested++;

  if (options.exportEvery > 0 && state.ingested % options.exportEvery === 0) {
    await writeResultsCsv(monitor.getHistory(), path.join(options.exportDir, 'live_output.csv'));
  }
  return true;
}

/**
 * Start the sensor polling cron job. Ticks that fire while the previous one
 * is still running are skipped.
 */
export function startSensorPollingJob(monitor: MonitorService, options: SensorPollingOptions): ScheduledTask {
  const state: PollState = { step: 0, ingested: 0 };
  let isRunning = false;

  const task = cron.schedule(options.schedule, async () => {
    if (isRunning) {
      logger.debug('Sensor poll still in progress, skipping tick');
      return;
    }
    isRunning = true;
    try {
      await pollOnce(monitor, options, state);
    } catch (error) {
      logger.error('Sensor polling job failed', {
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    } finally {
      isRunning = false;
    }
  });

  logger.info(`Sensor polling job scheduled: ${options.schedule}`, { endpoint: options.endpointUrl });
  return task;
}
