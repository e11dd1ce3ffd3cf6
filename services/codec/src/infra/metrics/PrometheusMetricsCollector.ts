import { Counter, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してコーデックの処理件数を収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly encodedCounter: Counter<'kind'>;
  private readonly decodedCounter: Counter<'kind'>;
  private readonly errorCounter: Counter<'error_type'>;
  private readonly skippedCounter: Counter<'kind'>;

  constructor(prefix = 'codec') {
    this.register = new Registry();

    this.encodedCounter = new Counter({
      name: `${prefix}_records_encoded_total`,
      help: 'Total number of records encoded',
      labelNames: ['kind'],
      registers: [this.register],
    });

    this.decodedCounter = new Counter({
      name: `${prefix}_records_decoded_total`,
      help: 'Total number of records decoded',
      labelNames: ['kind'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: `${prefix}_errors_total`,
      help: 'Total number of codec errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    // skip ポリシーで読み飛ばした件数
    this.skippedCounter = new Counter({
      name: `${prefix}_records_skipped_total`,
      help: 'Total number of records skipped while decoding a stream',
      labelNames: ['kind'],
      registers: [this.register],
    });
  }

  incrementEncoded(kind: string): void {
    this.encodedCounter.inc({ kind });
  }

  incrementDecoded(kind: string): void {
    this.decodedCounter.inc({ kind });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementSkipped(kind: string): void {
    this.skippedCounter.inc({ kind });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
