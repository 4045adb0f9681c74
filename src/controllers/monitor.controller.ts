import { Request, Response } from 'express';
import { MonitorService } from '@/services/monitor.service';
import { sendError } from '@/controllers/error-response';

export interface MonitorController {
  ingestReading(req: Request, res: Response): void;
  getLatest(req: Request, res: Response): void;
  getHistory(req: Request, res: Response): void;
  getStatus(req: Request, res: Response): void;
  resetMonitor(req: Request, res: Response): void;
}

const parseLimit = (value: unknown): number | undefined | null => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  return Number.parseInt(value, 10);
};

// undefined: keep the current product; null: malformed
const readProduct = (body: unknown): string | undefined | null => {
  if (typeof body !== 'object' || body === null || !('product' in body) || body.product === undefined) {
    return undefined;
  }
  const { product } = body;
  return typeof product === 'string' && product.trim() !== '' ? product.trim() : null;
};

export const createMonitorController = (monitor: MonitorService): MonitorController => ({
  ingestReading(req, res) {
    try {
      const result = monitor.ingest(req.body);
      res.status(201).json({ success: true, data: result });
    } catch (error) {
      sendError(res, error, 'Reading ingestion error');
    }
  },

  getLatest(_req, res) {
    const latest = monitor.getLatest();
    if (!latest) {
      res.status(404).json({
        success: false,
        error: { code: 'NO_DATA', message: 'No readings have been scored yet' }
      });
      return;
    }
    res.json({ success: true, data: latest });
  },

  getHistory(req, res) {
    const limit = parseLimit(req.query.limit);
    if (limit === null) {
      res.status(400).json({
        success: false,
        error: { code: 'INVALID_INPUT', message: 'limit must be a non-negative integer' }
      });
      return;
    }
    const history = monitor.getHistory(limit);
    res.json({ success: true, data: history, count: history.length });
  },

  getStatus(_req, res) {
    res.json({ success: true, data: monitor.getStatus() });
  },

  resetMonitor(req, res) {
    const product = readProduct(req.body);
    if (product === null) {
      res.status(400).json({
        success: false,
        error: { code: 'INVALID_INPUT', message: 'product must be a non-empty string' }
      });
      return;
    }
    try {
      res.json({ success: true, data: monitor.reset(product) });
    } catch (error) {
      sendError(res, error, 'Monitor reset error');
    }
  }
});
