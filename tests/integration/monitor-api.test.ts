import request from 'supertest';
import { Express } from 'express';
import { createApp } from '@/app';
import { MonitorService } from '@/services/monitor.service';

const stable = { temp_inside_c: 4.8, temp_outside_c: 31.2, humidity_pct: 62, door_open: 0, gas_ppm: 520 };

describe('Monitor API Integration', () => {
  let app: Express;

  beforeEach(() => {
    app = createApp(new MonitorService({
      product: 'vaccine',
      windowSize: 30,
      mode: 'adaptive',
      requireConsecutive: 2,
      historyLimit: 100
    }));
  });

  describe('GET /health', () => {
    test('should report the monitored product', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body).toMatchObject({ status: 'ok', product: 'vaccine', risk_level: 'ok', processed: 0 });
    });
  });

  describe('POST /api/v1/monitor/readings', () => {
    test('should score a reading', async () => {
      const res = await request(app)
        .post('/api/v1/monitor/readings')
        .send({ ...stable, ts: 0 })
        .expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({
        ts: 0,
        product: 'vaccine',
        instant_spoilage_pct: 73.77,
        cumulative_spoilage_pct: 73.77,
        risk_level: 'ok',
        adaptive_thresholds: { warn: 60, crit: 80 }
      });
    });

    test('should reject a reading with a missing field', async () => {
      const res = await request(app)
        .post('/api/v1/monitor/readings')
        .send({ temp_inside_c: 5, humidity_pct: 50, door_open: 0 })
        .expect(400);

      expect(res.body).toEqual({
        success: false,
        error: { code: 'INVALID_READING', message: 'Missing required field: temp_outside_c' }
      });
    });

    test('should reject an unrealistic outside temperature', async () => {
      const res = await request(app)
        .post('/api/v1/monitor/readings')
        .send({ ...stable, temp_outside_c: 200 })
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_INPUT');
    });

    test('should return 404 for an unknown product', async () => {
      const res = await request(app)
        .post('/api/v1/monitor/readings')
        .send({ ...stable, product: 'cheese' })
        .expect(404);

      expect(res.body.error).toEqual({ code: 'UNKNOWN_PRODUCT', message: "Unknown product 'cheese'" });
    });

    test('should reject malformed JSON', async () => {
      const res = await request(app)
        .post('/api/v1/monitor/readings')
        .set('Content-Type', 'application/json')
        .send('{"temp_inside_c": ')
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_JSON');
    });
  });

  describe('GET /api/v1/monitor/latest and /history', () => {
    test('should return 404 before any reading', async () => {
      const res = await request(app).get('/api/v1/monitor/latest').expect(404);

      expect(res.body.error.code).toBe('NO_DATA');
    });

    test('should return the latest result and a limited history', async () => {
      for (let i = 0; i < 3; i++) {
        await request(app).post('/api/v1/monitor/readings').send({ ...stable, ts: i * 60 }).expect(201);
      }

      const latest = await request(app).get('/api/v1/monitor/latest').expect(200);
      expect(latest.body.data.ts).toBe(120);

      const history = await request(app).get('/api/v1/monitor/history?limit=2').expect(200);
      expect(history.body.count).toBe(2);
      expect(history.body.data.map((r: { ts: number }) => r.ts)).toEqual([60, 120]);

      await request(app).get('/api/v1/monitor/history?limit=abc').expect(400);
    });
  });

  describe('GET /api/v1/monitor/status and POST /reset', () => {
    test('should report counters and reset them', async () => {
      await request(app).post('/api/v1/monitor/readings').send({ ...stable, ts: 0 }).expect(201);
      await request(app).post('/api/v1/monitor/readings').send({ temp_inside_c: 5 }).expect(400);

      const status = await request(app).get('/api/v1/monitor/status').expect(200);
      expect(status.body.data).toMatchObject({ product: 'vaccine', processed: 1, rejected: 1, history_size: 1, last_ts: 0 });

      const reset = await request(app).post('/api/v1/monitor/reset').send({ product: 'seafood' }).expect(200);
      expect(reset.body.data).toMatchObject({ product: 'seafood', processed: 0, rejected: 0, history_size: 0 });
    });

    test('should refuse to reset to an unknown product', async () => {
      const res = await request(app).post('/api/v1/monitor/reset').send({ product: 'cheese' }).expect(404);
      expect(res.body.error.code).toBe('UNKNOWN_PRODUCT');

      await request(app).post('/api/v1/monitor/reset').send({ product: 42 }).expect(400);
    });
  });

  describe('GET /api/v1/profiles', () => {
    test('should list base profiles', async () => {
      const res = await request(app).get('/api/v1/profiles').expect(200);

      expect(res.body.count).toBe(3);
      expect(res.body.data.map((p: { product: string }) => p.product)).toEqual(['fruit', 'vaccine', 'seafood']);
    });

    test('should derive a dynamic profile', async () => {
      const res = await request(app).get('/api/v1/profiles/vaccine/dynamic?door=1&variability=10').expect(200);

      expect(res.body.data).toMatchObject({
        product: 'vaccine',
        max_safe_temp: 8.5,
        z_threshold_dynamic: 4,
        ewma_threshold_dynamic: 3.6
      });
    });

    test('should validate query parameters', async () => {
      await request(app).get('/api/v1/profiles/vaccine/dynamic?outside=hot').expect(400);
      await request(app).get('/api/v1/profiles/vaccine/dynamic?outside=80').expect(400);
      await request(app).get('/api/v1/profiles/cheese/dynamic').expect(404);
    });
  });
});
