import type {AccountNumber} from './AccountNumber';
import type {AccountType} from './AccountPolicy';
import {balanceAfterDeposit, mayWithdraw} from './AccountPolicy';
import type {Money} from './Money';

export class Account {
    private constructor(
        private readonly accountNumber: AccountNumber,
        private readonly holderName: string,
        private readonly type: AccountType,
        private balance: Money
    ) {
    }

    /**
     * 種別を指定して口座を開設
     */
    static open(
        type: AccountType,
        accountNumber: AccountNumber,
        holderName: string,
        initialBalance: Money
    ): Account {
        return new Account(accountNumber, holderName, type, initialBalance);
    }

    static savings(accountNumber: AccountNumber, holderName: string, initialBalance: Money): Account {
        return Account.open('Savings', accountNumber, holderName, initialBalance);
    }

    static checking(accountNumber: AccountNumber, holderName: string, initialBalance: Money): Account {
        return Account.open('Checking', accountNumber, holderName, initialBalance);
    }

    getAccountNumber(): AccountNumber {
        return this.accountNumber;
    }

    getHolderName(): string {
        return this.holderName;
    }

    getType(): AccountType {
        return this.type;
    }

    getBalance(): Money {
        return this.balance;
    }

    /**
     * 入金を実行
     *
     * 入金は常に成功する。Savings は利息（3%）が上乗せされる。
     * 金額の妥当性（正の値か）はここでは見ない。コマンド側で弾く。
     */
    deposit(money: Money): void {
        this.balance = balanceAfterDeposit(this.type, this.balance, money);
    }

    /**
     * 出金を実行
     *
     * @returns 出金できた場合 true。フロアを下回る場合は残高を変えずに false
     */
    withdraw(money: Money): boolean {
        if (!mayWithdraw(this.type, this.balance, money)) {
            return false;
        }

        this.balance = this.balance.minus(money);
        return true;
    }
}
