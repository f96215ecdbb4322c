import { Injectable } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ITEMS_JSONL, METRICS_JSON } from '../config/metrics.constants';
import { MetricsItem, MetricsSnapshot } from '../types/metrics.types';

@Injectable()
export class MetricsStorageService {
  /**
   * Reads the parsed item collection. Returns null when the file does not
   * exist; throws on any line that is not a JSON object.
   */
  async loadItems(): Promise<MetricsItem[] | null> {
    let raw: string;
    try {
      raw = await fs.readFile(ITEMS_JSONL, 'utf-8');
    } catch (error) {
      if (this.isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return this.parseItems(raw, ITEMS_JSONL);
  }

  async loadSnapshot(): Promise<MetricsSnapshot | null> {
    return this.safeReadJson<MetricsSnapshot>(METRICS_JSON);
  }

  async saveSnapshot(snapshot: MetricsSnapshot): Promise<string> {
    await this.safeWriteJson(METRICS_JSON, snapshot);
    return METRICS_JSON;
  }

  private parseItems(raw: string, filePath: string): MetricsItem[] {
    const items: MetricsItem[] = [];
    const lines = raw.split(/\r?\n/);

    for (let i = 0; i < lines.length; i += 1) {
      const line = lines[i].trim();
      if (!line) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`invalid item json at ${filePath}:${i + 1} ${message}`);
      }
      if (!this.isRecord(parsed)) {
        throw new Error(`item at ${filePath}:${i + 1} is not an object`);
      }
      items.push(this.toItem(parsed));
    }

    return items;
  }

  // Non-string values in the known text fields count as absent.
  private toItem(record: Record<string, unknown>): MetricsItem {
    return {
      ...record,
      source: this.textField(record.source),
      title: this.textField(record.title),
      url: this.textField(record.url),
      published_at: this.textField(record.published_at),
      parsed_at: this.textField(record.parsed_at),
    };
  }

  private textField(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
  }

  private isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
  }

  private async safeReadJson<T>(filePath: string): Promise<T | null> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch {
      return null;
    }
  }

  private async safeWriteJson(
    filePath: string,
    payload: unknown,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
