/**
 * 口座番号（値オブジェクト）
 */
export class AccountNumber {
    constructor(private readonly value: number) {
        if (!Number.isSafeInteger(value)) {
            throw new Error(`Account number must be an integer: ${String(value)}`);
        }
    }

    getValue(): number {
        return this.value;
    }

    equals(other: AccountNumber): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }
}
