import type { Transaction } from '../../domain/model/Transaction';

export type TransactionListing =
    | { readonly status: 'EMPTY' }
    | { readonly status: 'LISTED'; readonly transactions: readonly Transaction[] };

/**
 * 取引一覧クエリ（入力ポート）
 */
export interface ListTransactionsQuery {
    /**
     * 台帳の取引を追加順に取得
     */
    listTransactions(): TransactionListing;
}

/**
 * DI用のシンボル
 */
export const ListTransactionsQueryToken = Symbol('ListTransactionsQuery');
