/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: エンコード・デコードの件数とエラーの収集を抽象化
 */
export interface MetricsCollector {
  /**
   * エンコードしたレコード数をカウント
   * @param kind レコード種別（bbo, kline, orderbook など）
   */
  incrementEncoded(kind: string): void;

  /**
   * デコードしたレコード数をカウント
   * @param kind レコード種別
   */
  incrementDecoded(kind: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラークラス名（TruncatedInputError など）
   */
  incrementError(errorType: string): void;

  /**
   * skip ポリシーで読み飛ばしたレコード数をカウント
   */
  incrementSkipped(kind: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  getRegistry(): MetricsRegistry;
}
