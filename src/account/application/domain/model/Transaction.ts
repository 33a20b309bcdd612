import type {AccountNumber} from './AccountNumber';
import type {Money} from './Money';

/**
 * 取引の種類
 */
export type TransactionKind = 'Deposit' | 'Withdrawal';

export const TRANSACTION_KINDS = ['Deposit', 'Withdrawal'] as const satisfies readonly TransactionKind[];

/**
 * 取引ID（値オブジェクト）
 */
export class TransactionId {
    constructor(private readonly value: number) {}

    getValue(): number {
        return this.value;
    }

    equals(other: TransactionId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }
}

/**
 * 完了した取引の記録
 *
 * 一度作られたら変更されない。IDは Bank が台帳に追加する時点で採番する。
 */
export class Transaction {
    private constructor(
        private readonly id: TransactionId,
        private readonly accountNumber: AccountNumber,
        private readonly money: Money,
        private readonly kind: TransactionKind,
        private readonly timestamp: Date
    ) {
    }

    static record(
        id: TransactionId,
        accountNumber: AccountNumber,
        money: Money,
        kind: TransactionKind,
        timestamp: Date
    ): Transaction {
        return new Transaction(id, accountNumber, money, kind, new Date(timestamp.getTime()));
    }

    getId(): TransactionId {
        return this.id;
    }

    getAccountNumber(): AccountNumber {
        return this.accountNumber;
    }

    getMoney(): Money {
        return this.money;
    }

    getKind(): TransactionKind {
        return this.kind;
    }

    getTimestamp(): Date {
        return new Date(this.timestamp.getTime());
    }

    /**
     * 例: "Transaction 1: Deposit of 100.00 on 2024-01-15T09:30:00.000Z"
     */
    toString(): string {
        return `Transaction ${this.id.toString()}: ${this.kind} of ${this.money.toString()} on ${this.timestamp.toISOString()}`;
    }
}
