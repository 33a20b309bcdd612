import type {Account} from './Account';
import type {AccountNumber} from './AccountNumber';
import type {WithdrawalRejection} from './AccountPolicy';
import {depositInterest, withdrawalRejection} from './AccountPolicy';
import {Ledger} from './Ledger';
import {Money} from './Money';
import type {TransactionKind} from './Transaction';
import {Transaction, TransactionId} from './Transaction';

/**
 * 口座登録の結果
 */
export type AddAccountOutcome =
    | { readonly status: 'ADDED'; readonly account: Account }
    | { readonly status: 'DUPLICATE_ACCOUNT_NUMBER'; readonly existing: Account };

/**
 * 入出金の結果
 *
 * 失敗は例外ではなく status で表す。
 * 台帳に取引が追加されるのは COMPLETED のときだけ。
 */
export type TransactionOutcome =
    | {
          readonly status: 'COMPLETED';
          readonly transaction: Transaction;
          readonly account: Account;
          readonly interest: Money;
      }
    | { readonly status: 'ACCOUNT_NOT_FOUND'; readonly accountNumber: AccountNumber }
    | { readonly status: WithdrawalRejection; readonly account: Account };

export type Clock = () => Date;

/**
 * 銀行（集約）
 *
 * 口座の集合・取引台帳・取引カウンタを唯一所有する。
 * 全ての操作は同期的に完了する（残高の変更と台帳への追加の間に割り込みはない）。
 */
export class Bank {
    private readonly accounts = new Map<number, Account>();
    private readonly ledger = new Ledger();
    private transactionCounter = 0;

    constructor(private readonly clock: Clock = () => new Date()) {
    }

    /**
     * 口座を登録
     *
     * 同じ口座番号がすでにあれば登録しない（既存の口座はそのまま）
     */
    addAccount(account: Account): AddAccountOutcome {
        const key = account.getAccountNumber().getValue();
        const existing = this.accounts.get(key);

        if (existing) {
            return {status: 'DUPLICATE_ACCOUNT_NUMBER', existing};
        }

        this.accounts.set(key, account);
        return {status: 'ADDED', account};
    }

    /**
     * 口座番号で口座を検索
     *
     * @returns 見つからなければ null
     */
    getAccount(accountNumber: AccountNumber): Account | null {
        return this.accounts.get(accountNumber.getValue()) ?? null;
    }

    /**
     * 登録順の口座一覧
     */
    listAccounts(): readonly Account[] {
        return [...this.accounts.values()];
    }

    getAccountCount(): number {
        return this.accounts.size;
    }

    /**
     * 入出金を実行し、成功したら台帳に記録する
     *
     * 1. 口座を検索（なければ何もしない）
     * 2. 入金（常に成功）または出金（フロアで失敗しうる）
     * 3. 成功時のみカウンタを進めて取引を追加
     */
    makeTransaction(accountNumber: AccountNumber, money: Money, kind: TransactionKind): TransactionOutcome {
        const account = this.getAccount(accountNumber);
        if (!account) {
            return {status: 'ACCOUNT_NOT_FOUND', accountNumber};
        }

        let interest = Money.ZERO;

        if (kind === 'Deposit') {
            interest = depositInterest(account.getType(), money);
            account.deposit(money);
        } else if (!account.withdraw(money)) {
            return {status: withdrawalRejection(account.getType()), account};
        }

        this.transactionCounter += 1;
        const transaction = Transaction.record(
            new TransactionId(this.transactionCounter),
            accountNumber,
            money,
            kind,
            this.clock()
        );
        this.ledger.append(transaction);

        return {status: 'COMPLETED', transaction, account, interest};
    }

    /**
     * 台帳の取引一覧（追加順）
     */
    listTransactions(): readonly Transaction[] {
        return this.ledger.getTransactions();
    }
}
