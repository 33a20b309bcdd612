import {Money} from './Money';

/**
 * 口座の種類（タグ）
 */
export type AccountType = 'Savings' | 'Checking';

export const ACCOUNT_TYPES = ['Savings', 'Checking'] as const satisfies readonly AccountType[];

/**
 * 普通預金の利率（入金1回ごとに付与される一度きりのボーナス）
 */
export const SAVINGS_INTEREST_RATE = '0.03';

/**
 * 当座預金の借越限度額
 */
export const CHECKING_OVERDRAFT_LIMIT = Money.of(500);

/**
 * 出金が拒否された理由
 */
export type WithdrawalRejection = 'INSUFFICIENT_FUNDS' | 'OVERDRAFT_LIMIT_REACHED';

/**
 * 口座種別ごとの残高ルール
 *
 * 【サブクラスではなく関数で表現する】
 * 口座の振る舞いの違いは「入金ボーナス」と「出金の下限（フロア）」だけ。
 * Account を継承で分けず、タグ（AccountType）を switch で見て
 * 純粋関数を選ぶ。新しい種別を足したときは assertNever がコンパイルエラーで教えてくれる。
 */

/**
 * 入金時に付与される利息
 *
 * 金額の正負はチェックしない（入金は常に成功する）
 */
export function depositInterest(type: AccountType, amount: Money): Money {
    switch (type) {
        case 'Savings':
            return amount.times(SAVINGS_INTEREST_RATE);
        case 'Checking':
            return Money.ZERO;
        default:
            return assertNever(type);
    }
}

/**
 * 入金後の残高
 */
export function balanceAfterDeposit(type: AccountType, balance: Money, amount: Money): Money {
    return balance.plus(amount).plus(depositInterest(type, amount));
}

/**
 * 出金後に許される最低残高（フロア）
 *
 * - Savings: 0
 * - Checking: -500
 */
export function withdrawalFloor(type: AccountType): Money {
    switch (type) {
        case 'Savings':
            return Money.ZERO;
        case 'Checking':
            return CHECKING_OVERDRAFT_LIMIT.negate();
        default:
            return assertNever(type);
    }
}

/**
 * 出金してよいかどうか
 *
 * 残高 - 出金額 がフロアを下回らなければ許可（フロアちょうどはOK）
 */
export function mayWithdraw(type: AccountType, balance: Money, amount: Money): boolean {
    return balance.minus(amount).isGreaterThanOrEqualTo(withdrawalFloor(type));
}

/**
 * 出金が拒否されたときの理由
 */
export function withdrawalRejection(type: AccountType): WithdrawalRejection {
    switch (type) {
        case 'Savings':
            return 'INSUFFICIENT_FUNDS';
        case 'Checking':
            return 'OVERDRAFT_LIMIT_REACHED';
        default:
            return assertNever(type);
    }
}

function assertNever(value: never): never {
    throw new Error(`Unknown account type: ${String(value)}`);
}
