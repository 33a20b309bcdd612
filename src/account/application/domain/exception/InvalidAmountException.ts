// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// InvalidAmountException（不正金額例外）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 【この例外クラスの目的】
// - コマンドの生成時に、業務上受け付けられない金額を弾く
// - 入出金額が 0 以下、開設時の初期残高がマイナス、など
//
// 【残高不足との違い】
// 残高不足・借越限度超過は Bank が status で返す「想定内の結果」。
// こちらはドメインに入る前の入力の誤りなので、例外で表す。
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

import type {Money} from '../model/Money';

export class InvalidAmountException extends Error {
    /**
     * 受け付けなかった金額
     */
    public readonly amount: Money;

    /**
     * どの項目の金額か（例: 'amount', 'initialBalance'）
     */
    public readonly field: string;

    constructor(field: string, amount: Money, rule: string) {
        super(`Invalid ${field}: ${amount.toString()} (${rule})`);

        this.name = 'InvalidAmountException';
        this.field = field;
        this.amount = amount;
    }
}
