import Big from 'big.js';

/**
 * お金を表す値オブジェクト
 * 不変（immutable）で、10進数の正確な演算をカプセル化
 *
 * 【なぜ number ではなく big.js なのか】
 * 0.1 + 0.2 !== 0.3 のように、浮動小数点では利息計算（3%）に誤差が出る。
 * Big は10進数のまま計算するので、100 × 1.03 は必ず 103 になる。
 */
export class Money {
    public static readonly ZERO = Money.of(0);

    private constructor(private readonly amount: Big) {}

    /**
     * 数値・10進数文字列からMoneyインスタンスを生成
     *
     * @throws Error 数値として解釈できない文字列の場合（big.js の例外）
     */
    static of(value: number | string | Big): Money {
        return new Money(new Big(value));
    }

    /**
     * 金額が正の値かどうか
     */
    isPositive(): boolean {
        return this.amount.gt(0);
    }

    /**
     * 金額が0または正の値かどうか
     */
    isPositiveOrZero(): boolean {
        return this.amount.gte(0);
    }

    /**
     * 金額が負の値かどうか
     */
    isNegative(): boolean {
        return this.amount.lt(0);
    }

    isGreaterThan(other: Money): boolean {
        return this.amount.gt(other.amount);
    }

    isGreaterThanOrEqualTo(other: Money): boolean {
        return this.amount.gte(other.amount);
    }

    isLessThan(other: Money): boolean {
        return this.amount.lt(other.amount);
    }

    /**
     * 2つのMoneyを加算
     */
    static add(a: Money, b: Money): Money {
        return new Money(a.amount.plus(b.amount));
    }

    plus(other: Money): Money {
        return Money.add(this, other);
    }

    /**
     * 2つのMoneyを減算
     */
    static subtract(a: Money, b: Money): Money {
        return new Money(a.amount.minus(b.amount));
    }

    minus(other: Money): Money {
        return Money.subtract(this, other);
    }

    /**
     * 係数を掛ける（利率の計算用）
     *
     * 係数は文字列で渡すのが安全（'0.03' など）
     */
    times(factor: number | string): Money {
        return new Money(this.amount.times(factor));
    }

    /**
     * 符号を反転
     */
    negate(): Money {
        return new Money(this.amount.times(-1));
    }

    getAmount(): Big {
        return this.amount;
    }

    /**
     * 等価性チェック（100 と 100.00 は等しい）
     */
    equals(other: Money): boolean {
        return this.amount.eq(other.amount);
    }

    /**
     * 文字列表現
     *
     * 小数点以下は最低2桁、それ以上の有効桁はすべて残す
     * 例: 203 → "203.00", 0.3003 → "0.3003", -400 → "-400.00"
     */
    toString(): string {
        const [, fraction = ''] = this.amount.toFixed().split('.');
        return this.amount.toFixed(Math.max(2, fraction.length));
    }

    /**
     * JSON表現
     *
     * Big をそのままシリアライズすると精度の情報が失われるため、
     * toString() と同じ文字列で出力する。
     */
    toJSON(): { amount: string } {
        return {
            amount: this.toString(),
        };
    }
}
