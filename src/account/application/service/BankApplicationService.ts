import {inject, injectable} from 'tsyringe';
import {BankToken} from '../../../config/types';
import {Account} from '../domain/model/Account';
import type {AccountNumber} from '../domain/model/AccountNumber';
import type {AddAccountOutcome, Bank, TransactionOutcome} from '../domain/model/Bank';
import type {CreateAccountCommand} from '../port/in/CreateAccountCommand';
import type {CreateAccountUseCase} from '../port/in/CreateAccountUseCase';
import type {AccountBalanceResult, GetAccountBalanceQuery} from '../port/in/GetAccountBalanceQuery';
import type {ListTransactionsQuery, TransactionListing} from '../port/in/ListTransactionsQuery';
import type {MakeTransactionCommand} from '../port/in/MakeTransactionCommand';
import type {MakeTransactionUseCase} from '../port/in/MakeTransactionUseCase';
import type {BankLock} from '../port/out/BankLock';
import {BankLockToken} from '../port/out/BankLock';

/**
 * 銀行アプリケーションサービス
 *
 * 役割: ユースケースの調整・オーケストレーション
 * - 4つの入力ポート（口座開設・入出金・残高照会・取引一覧）を実装
 * - ビジネスルールは Bank 集約と AccountPolicy に委譲
 * - 状態を変更する操作は BankLock で囲む
 *
 * 入力ポートごとに別クラスにはせず、同じ Bank を扱う1クラスにまとめ、
 * container.ts で各トークンから useToken でこのクラスを指す。
 */
@injectable()
export class BankApplicationService
    implements CreateAccountUseCase, MakeTransactionUseCase, GetAccountBalanceQuery, ListTransactionsQuery {
    constructor(
        @inject(BankToken)
        private readonly bank: Bank,
        @inject(BankLockToken)
        private readonly bankLock: BankLock
    ) {
    }

    createAccount(command: CreateAccountCommand): AddAccountOutcome {
        const account = Account.open(
            command.type,
            command.accountNumber,
            command.holderName,
            command.initialBalance
        );

        this.bankLock.acquire();
        try {
            const outcome = this.bank.addAccount(account);

            if (outcome.status === 'ADDED') {
                console.log(
                    `🏦 Account ${account.getAccountNumber().toString()} added for ${account.getHolderName()}.`
                );
            } else {
                console.warn(`⚠️  Account number already in use: ${command.accountNumber.toString()}`);
            }

            return outcome;
        } finally {
            this.bankLock.release();
        }
    }

    makeTransaction(command: MakeTransactionCommand): TransactionOutcome {
        // ① リソースロック
        this.bankLock.acquire();

        try {
            // ② 業務処理（口座検索 → 残高更新 → 台帳追加）
            const outcome = this.bank.makeTransaction(command.accountNumber, command.money, command.kind);

            // ③ 結果をログに記録
            switch (outcome.status) {
                case 'COMPLETED':
                    console.log(`✅ ${outcome.transaction.toString()}`);
                    break;
                case 'ACCOUNT_NOT_FOUND':
                    console.warn(`⚠️  Account not found: ${command.accountNumber.toString()}`);
                    break;
                case 'INSUFFICIENT_FUNDS':
                case 'OVERDRAFT_LIMIT_REACHED':
                    console.warn(
                        `⚠️  ${command.kind} rejected (${outcome.status}): ` +
                        `account ${command.accountNumber.toString()}, amount ${command.money.toString()}`
                    );
                    break;
            }

            return outcome;
        } finally {
            // ④ リソース解放（必ず実行）
            this.bankLock.release();
        }
    }

    getAccountBalance(accountNumber: AccountNumber): AccountBalanceResult {
        const account = this.bank.getAccount(accountNumber);

        if (!account) {
            return {status: 'ACCOUNT_NOT_FOUND', accountNumber};
        }

        return {status: 'FOUND', account};
    }

    listTransactions(): TransactionListing {
        const transactions = this.bank.listTransactions();

        if (transactions.length === 0) {
            return {status: 'EMPTY'};
        }

        return {status: 'LISTED', transactions};
    }
}
