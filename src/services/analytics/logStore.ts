import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../../utils/logger.js';
import { recordDiagnostic } from '../../observability/errorTracker.js';
import { instrumentDependency } from '../../observability/telemetry.js';
import type { RawRecord } from './types.js';

const LOG_EXTENSION = '.json';

export interface RecordSource {
  count(): Promise<number>;
  load(): Promise<RawRecord[]>;
}

function isMissingDirectory(error: unknown) {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads one telemetry document per `*.json` file in `directory`.
 * Files that cannot be read or parsed are skipped and reported.
 */
export class LogStore implements RecordSource {
  constructor(readonly directory: string) {}

  async count(): Promise<number> {
    return (await this.listFiles()).length;
  }

  async load(): Promise<RawRecord[]> {
    return instrumentDependency('filesystem', 'load', async () => {
      const files = await this.listFiles();
      const records: RawRecord[] = [];

      for (const file of files) {
        const record = await this.readRecord(file);
        if (record) {
          records.push(record);
        }
      }

      logger.debug('Telemetry logs loaded', { directory: this.directory, files: files.length, records: records.length });
      return records;
    });
  }

  private async listFiles(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.endsWith(LOG_EXTENSION))
        .map((entry) => path.join(this.directory, entry.name))
        .sort();
    } catch (error) {
      if (isMissingDirectory(error)) {
        return [];
      }
      throw error;
    }
  }

  private async readRecord(file: string): Promise<RawRecord | null> {
    try {
      const [raw, stat] = await Promise.all([fs.readFile(file, 'utf8'), fs.stat(file)]);
      const document: unknown = JSON.parse(raw);
      if (!isJsonObject(document)) {
        this.reportSkipped(file, 'INVALID_DOCUMENT', 'Telemetry log is not a JSON object');
        return null;
      }
      return { source: file, modifiedAt: stat.mtimeMs, document };
    } catch (error) {
      const code = error instanceof SyntaxError ? 'INVALID_JSON' : 'READ_FAILED';
      this.reportSkipped(file, code, error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  private reportSkipped(file: string, code: string, message: string) {
    logger.warn('Skipping unreadable telemetry log', { file, code, message });
    recordDiagnostic({ stage: 'ingestion', source: file, code, message });
  }
}
