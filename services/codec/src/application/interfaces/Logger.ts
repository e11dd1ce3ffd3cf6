/**
 * ロガーインターフェース
 *
 * コーデックのユースケースが使う構造化ログの出力先。
 * 実装は pino（`PinoLogger`）、テストでは `LoggerMock` を使う。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  /**
   * 警告レベルのログを出力
   * レコードのスキップなど、処理は継続できる異常に使う
   */
  warn(msg: string, meta?: object): void;

  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * @param bindings 付与するコンテキスト（component, kind など）
   */
  child(bindings: object): Logger;
}
