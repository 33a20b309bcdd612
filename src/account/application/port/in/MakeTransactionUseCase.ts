import type { TransactionOutcome } from '../../domain/model/Bank';
import type { MakeTransactionCommand } from './MakeTransactionCommand';

/**
 * 入出金ユースケースのインターフェース（入力ポート）
 */
export interface MakeTransactionUseCase {
    /**
     * 入金または出金を実行
     *
     * @returns 実行結果。失敗（口座なし・残高不足・借越限度超過）も例外ではなく結果で返る
     */
    makeTransaction(command: MakeTransactionCommand): TransactionOutcome;
}

/**
 * DI用のシンボル
 */
export const MakeTransactionUseCaseToken = Symbol('MakeTransactionUseCase');
