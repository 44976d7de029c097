import { logger } from '../../utils/logger.js';
import { Mutex } from '../../utils/mutex.js';
import { extractFeatures } from './featureExtractor.js';
import type { RecordSource } from './logStore.js';
import type { RiskClassifier } from './riskClassifier.js';
import type { CacheEntry, FeatureRow } from './types.js';

/**
 * Holds the extracted feature table for the current record count. A change in
 * the count triggers a full reload, re-extraction and classifier retrain.
 */
export class FeatureCache {
  private entry: CacheEntry | null = null;

  private readonly lock = new Mutex();

  constructor(
    private readonly source: RecordSource,
    private readonly classifier: RiskClassifier
  ) {}

  async getSnapshot(): Promise<CacheEntry> {
    return this.lock.runExclusive(async () => {
      const sourceCount = await this.source.count();
      if (this.entry && this.entry.sourceCount === sourceCount) {
        return this.entry;
      }

      const records = await this.source.load();
      const rows = extractFeatures(records);
      const retrained = this.classifier.train(rows);
      const entry: CacheEntry = {
        rows,
        sourceCount,
        epoch: (this.entry?.epoch ?? 0) + 1
      };
      this.entry = entry;

      logger.info('Feature cache refreshed', { epoch: entry.epoch, sourceCount, rows: rows.length, retrained });
      return entry;
    });
  }

  async getFeatures(): Promise<FeatureRow[]> {
    return (await this.getSnapshot()).rows;
  }

  get current(): CacheEntry | null {
    return this.entry;
  }
}
