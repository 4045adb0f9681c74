import fs from 'fs';
import os from 'os';
import path from 'path';
import { pollOnce, PollState, SensorPollingOptions } from '@/jobs/sensor-polling.job';
import { MonitorService } from '@/services/monitor.service';
import { fetchSensorReading } from '@/services/sensor-poller.service';

jest.mock('@/services/sensor-poller.service');

const mockedFetch = fetchSensorReading as jest.MockedFunction<typeof fetchSensorReading>;

const cool = { temp_inside_c: 2, temp_outside_c: 20, humidity_pct: 30, door_open: 0, gas_ppm: 0 } as const;

describe('Sensor Polling Job', () => {
  let exportDir: string;
  let options: SensorPollingOptions;
  let monitor: MonitorService;

  beforeEach(() => {
    exportDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spoilage-poll-'));
    options = {
      endpointUrl: 'http://sensor.local/data',
      schedule: '*/3 * * * * *',
      timeoutMs: 3000,
      exportDir,
      exportEvery: 2
    };
    monitor = new MonitorService({ product: 'vaccine', windowSize: 30, mode: 'adaptive', requireConsecutive: 2, historyLimit: 50 });
    mockedFetch.mockReset();
  });

  afterEach(() => {
    fs.rmSync(exportDir, { recursive: true, force: true });
  });

  it('should pass the monitored product and poll step to the fetcher', async () => {
    mockedFetch.mockResolvedValue({ ...cool, ts: 1 });
    const state: PollState = { step: 0, ingested: 0 };

    await expect(pollOnce(monitor, options, state)).resolves.toBe(true);

    expect(mockedFetch).toHaveBeenCalledWith('http://sensor.local/data', { timeoutMs: 3000, product: 'vaccine', fallbackTs: 1 });
    expect(state).toEqual({ step: 1, ingested: 1 });
    expect(monitor.getStatus().processed).toBe(1);
  });

  it('should skip ticks without a reading', async () => {
    mockedFetch.mockResolvedValue(null);
    const state: PollState = { step: 0, ingested: 0 };

    await expect(pollOnce(monitor, options, state)).resolves.toBe(false);
    expect(state).toEqual({ step: 1, ingested: 0 });
  });

  it('should skip rejected readings', async () => {
    mockedFetch.mockResolvedValue({ ...cool, temp_outside_c: 99 });
    const state: PollState = { step: 0, ingested: 0 };

    await expect(pollOnce(monitor, options, state)).resolves.toBe(false);
    expect(monitor.getStatus().rejected).toBe(1);
  });

  it('should export the history every N ingested readings', async () => {
    const state: PollState = { step: 0, ingested: 0 };
    const exportPath = path.join(exportDir, 'live_output.csv');

    mockedFetch.mockResolvedValue({ ...cool, ts: 0 });
    await pollOnce(monitor, options, state);
    expect(fs.existsSync(exportPath)).toBe(false);

    mockedFetch.mockResolvedValue({ ...cool, ts: 60 });
    await pollOnce(monitor, options, state);

    const lines = fs.readFileSync(exportPath, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[1].startsWith('0,vaccine,45.88,45.88,ok,')).toBe(true);
  });
});
