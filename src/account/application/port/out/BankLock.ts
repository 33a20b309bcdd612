/**
 * 銀行全体のロック/アンロックを行う出力ポート
 *
 * 残高の確認・変更と台帳への追加をひとまとまりに見せるための境界。
 * ロックの粒度は口座単位ではなく Bank 全体（粗粒度）。
 */
export interface BankLock {
  /**
   * ロックを取得
   */
  acquire(): void;

  /**
   * ロックを解放
   */
  release(): void;
}

/**
 * DI用のシンボル
 */
export const BankLockToken = Symbol('BankLock');
