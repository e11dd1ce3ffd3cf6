/**
 * バイト列の書き込み先の最小インターフェイス（インフラ層・トランスポート側で実装される）。
 */
export interface ByteSink {
  /**
   * バイト列を書き込む。
   * @param bytes 書き込むバイト列
   * @returns 受け付けたバイト数。書き込めない場合は例外を投げる
   */
  write(bytes: Uint8Array): number;
}
