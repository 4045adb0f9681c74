import { ProfileCatalog } from '@/types/profile.types';
import { ReadingInput } from '@/types/reading.types';
import { EngineMode, RiskLevel, SpoilageResult } from '@/types/result.types';
import { MonitorStatus, ResultListener } from '@/types/monitor.types';
import { SpoilageEngine } from '@/services/spoilage-engine.service';
import { profileCatalog } from '@/services/profile-catalog.service';
import { RingBuffer } from '@/utils/ring-buffer.utils';
import { SpoilageError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import Config from '@/config/index';

export interface MonitorOptions {
  product: string;
  windowSize: number;
  mode: EngineMode;
  requireConsecutive: number;
  historyLimit: number;
  catalog?: ProfileCatalog;
}

const RISK_RANK: Record<RiskLevel, number> = { ok: 0, warning: 1, critical: 2 };

/**
 * Owns the engine of one monitored stream and the results served to the
 * dashboard. Readings must be ingested one at a time.
 */
export class MonitorService {
  readonly catalog: ProfileCatalog;
  private engine: SpoilageEngine;
  private readonly results: RingBuffer<SpoilageResult>;
  private readonly listeners: ResultListener[] = [];
  private processed = 0;
  private rejected = 0;

  constructor(private readonly options: MonitorOptions) {
    this.catalog = options.catalog ?? profileCatalog;
    this.engine = this.createEngine(options.product);
    this.results = new RingBuffer<SpoilageResult>(options.historyLimit);
  }

  ingest(input: ReadingInput): SpoilageResult {
    const previousRisk = this.engine.getState().risk_level;

    let result: SpoilageResult;
    try {
      result = this.engine.update(input);
    } catch (error) {
      if (error instanceof SpoilageError) {
        this.rejected++;
        logger.warn(`Reading rejected (${error.code}): ${error.message}`);
      }
      throw error;
    }

    this.processed++;
    this.results.push(result);
    this.reportTransition(previousRisk, result);

    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        logger.error('Result listener failed', {
          error: error instanceof Error ? error.message : 'Unknown error'
        });
      }
    }
    return result;
  }

  /** Subscribe to scored results; returns the unsubscribe function. */
  onResult(listener: ResultListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  getLatest(): SpoilageResult | null {
    return this.results.last() ?? null;
  }

  getHistory(limit?: number): SpoilageResult[] {
    return limit === undefined ? this.results.toArray() : this.results.tail(limit);
  }

  getStatus(): MonitorStatus {
    const state = this.engine.getState();
    return {
      product: state.product,
      mode: state.mode,
      window_size: state.window_size,
      require_consecutive: state.require_consecutive,
      processed: this.processed,
      rejected: this.rejected,
      risk_level: state.risk_level,
      quality: state.quality,
      history_size: this.results.length,
      last_ts: state.last_ts
    };
  }

  /** Start a fresh engine, optionally for another product. Clears results. */
  reset(product?: string): MonitorStatus {
    this.engine = this.createEngine(product ?? this.engine.getState().product);
    this.results.clear();
    this.processed = 0;
    this.rejected = 0;
    logger.info(`Monitor reset for product ${this.engine.getState().product}`);
    return this.getStatus();
  }

  private createEngine(product: string): SpoilageEngine {
    return new SpoilageEngine(product, this.options.windowSize, this.options.mode, {
      requireConsecutive: this.options.requireConsecutive,
      catalog: this.catalog
    });
  }

  private reportTransition(previous: RiskLevel, result: SpoilageResult): void {
    const current = result.risk_level;
    if (RISK_RANK[current] > RISK_RANK[previous]) {
      logger.notify(
        `Risk escalated ${previous} -> ${current} for ${result.product}: ` +
        `instant ${result.instant_spoilage_pct}%, cumulative ${result.cumulative_spoilage_pct}% ` +
        `(${result.notes.join(' | ')})`
      );
    } else if (current === 'ok' && previous !== 'ok') {
      logger.info(`Risk back to ok for ${result.product}`);
    }
  }
}

export const createMonitorFromConfig = (): MonitorService => new MonitorService({
  product: Config.MONITOR.PRODUCT,
  windowSize: Config.MONITOR.WINDOW_SIZE,
  mode: Config.MONITOR.MODE,
  requireConsecutive: Config.MONITOR.REQUIRE_CONSECUTIVE,
  historyLimit: Config.MONITOR.HISTORY_LIMIT
});
