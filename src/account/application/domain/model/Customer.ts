import type {Account} from './Account';

/**
 * 顧客
 *
 * 口座を名義人ごとにまとめるだけの入れ物。
 * 口座の生存期間を管理するのは Bank で、ここでは参照を持つだけ。
 */
export class Customer {
    private readonly accounts: Account[] = [];

    constructor(
        private readonly id: number,
        private readonly name: string
    ) {
    }

    getId(): number {
        return this.id;
    }

    getName(): string {
        return this.name;
    }

    addAccount(account: Account): void {
        this.accounts.push(account);
    }

    getAccounts(): readonly Account[] {
        return [...this.accounts];
    }
}
