import type {Transaction} from './Transaction';

/**
 * 取引台帳
 * 追加のみ可能で、並び順は追加した順
 */
export class Ledger {
    private readonly transactions: Transaction[];

    constructor(...transactions: Transaction[]) {
        this.transactions = [...transactions];
    }

    /**
     * 取引を追加
     */
    append(transaction: Transaction): void {
        this.transactions.push(transaction);
    }

    /**
     * 取引のリストを取得（変更不可）
     */
    getTransactions(): readonly Transaction[] {
        return [...this.transactions];
    }

    isEmpty(): boolean {
        return this.transactions.length === 0;
    }

    size(): number {
        return this.transactions.length;
    }
}
