import { beforeEach, describe, it, expect } from "vitest";
import {Account} from "../../src/account/application/domain/model/Account";
import {AccountNumber} from "../../src/account/application/domain/model/AccountNumber";
import {Bank} from "../../src/account/application/domain/model/Bank";
import {Money} from "../../src/account/application/domain/model/Money";

describe("Bank", () => {
    const now = new Date("2024-03-01T12:00:00.000Z");
    const alice = new AccountNumber(1);
    const bob = new AccountNumber(2);

    let bank: Bank;

    beforeEach(() => {
        // 時刻を固定して取引の日時を検証できるようにする
        bank = new Bank(() => now);
    });

    // ========================================
    // 口座の登録と検索
    // ========================================

    describe("口座の登録", () => {
        it("登録した口座を口座番号で検索できる", () => {
            // Arrange
            const account = Account.savings(alice, "Alice", Money.of(100));

            // Act
            const outcome = bank.addAccount(account);

            // Assert
            expect(outcome).toEqual({status: "ADDED", account});
            expect(bank.getAccount(new AccountNumber(1))).toBe(account);
            expect(bank.getAccountCount()).toBe(1);
        });

        it("同じ口座番号は登録できず、既存の口座はそのまま", () => {
            // Arrange
            const original = Account.savings(alice, "Alice", Money.of(100));
            const duplicate = Account.checking(alice, "Mallory", Money.of(999));
            bank.addAccount(original);

            // Act
            const outcome = bank.addAccount(duplicate);

            // Assert
            expect(outcome).toEqual({status: "DUPLICATE_ACCOUNT_NUMBER", existing: original});
            expect(bank.getAccount(alice)).toBe(original);
            expect(bank.getAccountCount()).toBe(1);
        });

        it("存在しない口座番号は null", () => {
            expect(bank.getAccount(new AccountNumber(999))).toBeNull();
        });

        it("口座一覧は登録順", () => {
            // Arrange
            const second = Account.checking(bob, "Bob", Money.ZERO);
            const first = Account.savings(alice, "Alice", Money.ZERO);
            bank.addAccount(second);
            bank.addAccount(first);

            // Act & Assert
            expect(bank.listAccounts()).toEqual([second, first]);
        });
    });

    // ========================================
    // 入出金
    // ========================================

    describe("入出金", () => {
        it("Savings への入金: 100.00 に 100 入金すると 203.00、取引ID 1 が記録される", () => {
            // Arrange
            bank.addAccount(Account.savings(alice, "Alice", Money.of("100.00")));

            // Act
            const outcome = bank.makeTransaction(alice, Money.of(100), "Deposit");

            // Assert
            expect(outcome.status).toBe("COMPLETED");
            if (outcome.status !== "COMPLETED") return;

            expect(outcome.account.getBalance().toString()).toBe("203.00");
            expect(outcome.interest.toString()).toBe("3.00");
            expect(outcome.transaction.toString()).toBe(
                "Transaction 1: Deposit of 100.00 on 2024-03-01T12:00:00.000Z"
            );
            expect(bank.listTransactions()).toEqual([outcome.transaction]);
        });

        it("Checking: 0 から 400 出金は成功、さらに 200 出金は借越限度超過で失敗", () => {
            // Arrange
            bank.addAccount(Account.savings(alice, "Alice", Money.of("100.00")));
            bank.addAccount(Account.checking(bob, "Bob", Money.of("0.00")));
            bank.makeTransaction(alice, Money.of(100), "Deposit");

            // Act
            const first = bank.makeTransaction(bob, Money.of(400), "Withdrawal");
            const second = bank.makeTransaction(bob, Money.of(200), "Withdrawal");

            // Assert
            expect(first.status).toBe("COMPLETED");
            if (first.status === "COMPLETED") {
                expect(first.transaction.getId().getValue()).toBe(2);
                expect(first.interest.equals(Money.ZERO)).toBe(true);
            }

            expect(second.status).toBe("OVERDRAFT_LIMIT_REACHED");
            expect(bank.getAccount(bob)?.getBalance().toString()).toBe("-400.00");
            expect(bank.listTransactions()).toHaveLength(2);
        });

        it("Savings: 残高 50 から 60 出金は残高不足で失敗し、取引は記録されない", () => {
            // Arrange
            const account = Account.savings(alice, "Alice", Money.of(50));
            bank.addAccount(account);

            // Act
            const outcome = bank.makeTransaction(alice, Money.of(60), "Withdrawal");

            // Assert
            expect(outcome).toEqual({status: "INSUFFICIENT_FUNDS", account});
            expect(account.getBalance().toString()).toBe("50.00");
            expect(bank.listTransactions()).toEqual([]);
        });

        it("存在しない口座 999 への操作は ACCOUNT_NOT_FOUND で、何も変わらない", () => {
            // Arrange
            bank.addAccount(Account.savings(alice, "Alice", Money.of(100)));
            bank.makeTransaction(alice, Money.of(10), "Deposit");
            const unknown = new AccountNumber(999);

            // Act
            const deposit = bank.makeTransaction(unknown, Money.of(10), "Deposit");
            const withdrawal = bank.makeTransaction(unknown, Money.of(10), "Withdrawal");

            // Assert
            expect(deposit).toEqual({status: "ACCOUNT_NOT_FOUND", accountNumber: unknown});
            expect(withdrawal.status).toBe("ACCOUNT_NOT_FOUND");
            expect(bank.listTransactions()).toHaveLength(1);
            expect(bank.getAccount(alice)?.getBalance().toString()).toBe("110.30");
        });

        it("失敗した出金は取引IDを消費しない", () => {
            // Arrange
            bank.addAccount(Account.checking(bob, "Bob", Money.ZERO));

            // Act
            bank.makeTransaction(bob, Money.of(10), "Deposit");
            bank.makeTransaction(bob, Money.of(1000), "Withdrawal");
            bank.makeTransaction(bob, Money.of(5), "Withdrawal");

            // Assert
            const ids = bank.listTransactions().map((t) => t.getId().getValue());
            expect(ids).toEqual([1, 2]);
            expect(bank.listTransactions().map((t) => t.getKind())).toEqual(["Deposit", "Withdrawal"]);
        });

        it("取引IDは口座をまたいで1ずつ増える", () => {
            // Arrange
            bank.addAccount(Account.savings(alice, "Alice", Money.ZERO));
            bank.addAccount(Account.checking(bob, "Bob", Money.ZERO));

            // Act
            bank.makeTransaction(alice, Money.of(1), "Deposit");
            bank.makeTransaction(bob, Money.of(1), "Deposit");
            bank.makeTransaction(alice, Money.of(1), "Deposit");

            // Assert
            const transactions = bank.listTransactions();
            expect(transactions.map((t) => t.getId().getValue())).toEqual([1, 2, 3]);
            expect(transactions.map((t) => t.getAccountNumber().getValue())).toEqual([1, 2, 1]);
        });
    });

    it("取引がなければ一覧は空", () => {
        expect(bank.listTransactions()).toEqual([]);
    });
});
