/**
 * バイト列の読み出し元の最小インターフェイス（インフラ層・トランスポート側で実装される）。
 */
export interface ByteSource {
  /**
   * `buffer` に最大 `buffer.length` バイトを読み込む。
   * @param buffer 読み込み先
   * @returns 読み込んだバイト数。終端に達している場合は 0
   */
  read(buffer: Uint8Array): number;
}
