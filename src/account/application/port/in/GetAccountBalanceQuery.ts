import type { Account } from '../../domain/model/Account';
import type { AccountNumber } from '../../domain/model/AccountNumber';

export type AccountBalanceResult =
    | { readonly status: 'FOUND'; readonly account: Account }
    | { readonly status: 'ACCOUNT_NOT_FOUND'; readonly accountNumber: AccountNumber };

/**
 * 残高照会クエリ（入力ポート）
 *
 * 読み取りのみ。状態は一切変更しない。
 */
export interface GetAccountBalanceQuery {
    getAccountBalance(accountNumber: AccountNumber): AccountBalanceResult;
}

/**
 * DI用のシンボル
 */
export const GetAccountBalanceQueryToken = Symbol('GetAccountBalanceQuery');
