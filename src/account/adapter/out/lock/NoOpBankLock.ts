import { injectable } from 'tsyringe';
import type { BankLock } from '../../../application/port/out/BankLock';

/**
 * 銀行ロックのNo-Op実装
 * 実際のロック処理は行わない（シングルスレッドの単一プロセス用）
 */
@injectable()
export class NoOpBankLock implements BankLock {
  acquire(): void {
    // 何もしない
  }

  release(): void {
    // 何もしない
  }
}
