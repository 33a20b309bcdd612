import "reflect-metadata"

import {beforeEach, describe, expect, it, vi} from "vitest";
import {container} from "tsyringe";
import {Account} from "../../../src/account/application/domain/model/Account";
import {AccountNumber} from "../../../src/account/application/domain/model/AccountNumber";
import {Bank} from "../../../src/account/application/domain/model/Bank";
import {Money} from "../../../src/account/application/domain/model/Money";
import {CreateAccountCommand} from "../../../src/account/application/port/in/CreateAccountCommand";
import {MakeTransactionCommand} from "../../../src/account/application/port/in/MakeTransactionCommand";
import type {BankLock} from "../../../src/account/application/port/out/BankLock";
import {BankLockToken} from "../../../src/account/application/port/out/BankLock";
import {BankApplicationService} from "../../../src/account/application/service/BankApplicationService";
import {BankToken} from "../../../src/config/types";

/**
 * BankApplicationService の統合テスト
 *
 * 【テスト戦略】
 * - BankLock（出力ポート）はモック → 取得・解放の回数を検証
 * - Bank 集約は実物 → 実際のビジネスルールで結果が返ることを保証
 */
describe("BankApplicationService（統合テスト）", () => {
    let mockBankLock: BankLock;
    let bank: Bank;
    let service: BankApplicationService;

    const alice = new AccountNumber(1);
    const bob = new AccountNumber(2);

    beforeEach(() => {
        container.clearInstances();

        mockBankLock = {
            acquire: vi.fn(),
            release: vi.fn(),
        };

        bank = new Bank(() => new Date("2024-03-01T12:00:00.000Z"));

        container.register(BankToken, {useValue: bank});
        container.register(BankLockToken, {useValue: mockBankLock});

        service = container.resolve(BankApplicationService);
    });

    // ========================================
    // 口座開設
    // ========================================

    describe("口座開設", () => {
        it("コマンドの内容で口座が開設され、Bank に登録される", () => {
            // Arrange
            const command = new CreateAccountCommand("Savings", alice, "Alice", Money.of("100.00"));

            // Act
            const outcome = service.createAccount(command);

            // Assert
            expect(outcome.status).toBe("ADDED");
            const account = bank.getAccount(alice);
            expect(account?.getHolderName()).toBe("Alice");
            expect(account?.getType()).toBe("Savings");
            expect(account?.getBalance().toString()).toBe("100.00");
            expect(mockBankLock.acquire).toHaveBeenCalledTimes(1);
            expect(mockBankLock.release).toHaveBeenCalledTimes(1);
        });

        it("口座番号が重複すると DUPLICATE_ACCOUNT_NUMBER", () => {
            // Arrange
            service.createAccount(new CreateAccountCommand("Savings", alice, "Alice", Money.ZERO));

            // Act
            const outcome = service.createAccount(new CreateAccountCommand("Checking", alice, "Bob", Money.ZERO));

            // Assert
            expect(outcome.status).toBe("DUPLICATE_ACCOUNT_NUMBER");
            expect(bank.getAccount(alice)?.getHolderName()).toBe("Alice");
        });
    });

    // ========================================
    // 入出金
    // ========================================

    describe("入出金", () => {
        beforeEach(() => {
            bank.addAccount(Account.savings(alice, "Alice", Money.of("100.00")));
            bank.addAccount(Account.checking(bob, "Bob", Money.ZERO));
        });

        it("入金が成功すると COMPLETED と取引が返る", () => {
            // Act
            const outcome = service.makeTransaction(MakeTransactionCommand.deposit(alice, Money.of(100)));

            // Assert
            expect(outcome.status).toBe("COMPLETED");
            if (outcome.status === "COMPLETED") {
                expect(outcome.transaction.getId().getValue()).toBe(1);
                expect(outcome.account.getBalance().toString()).toBe("203.00");
            }
        });

        it("借越限度を超える出金は OVERDRAFT_LIMIT_REACHED で、取引は記録されない", () => {
            // Act
            const outcome = service.makeTransaction(MakeTransactionCommand.withdrawal(bob, Money.of("500.01")));

            // Assert
            expect(outcome.status).toBe("OVERDRAFT_LIMIT_REACHED");
            expect(service.listTransactions()).toEqual({status: "EMPTY"});
        });

        it("存在しない口座は ACCOUNT_NOT_FOUND", () => {
            // Act
            const outcome = service.makeTransaction(
                MakeTransactionCommand.deposit(new AccountNumber(999), Money.of(1))
            );

            // Assert
            expect(outcome.status).toBe("ACCOUNT_NOT_FOUND");
        });

        it("成功・失敗に関わらずロックを取得して解放する", () => {
            // Act
            service.makeTransaction(MakeTransactionCommand.deposit(alice, Money.of(1)));
            service.makeTransaction(MakeTransactionCommand.withdrawal(alice, Money.of(1000)));

            // Assert
            expect(mockBankLock.acquire).toHaveBeenCalledTimes(2);
            expect(mockBankLock.release).toHaveBeenCalledTimes(2);
        });

        it("Bank で例外が発生してもロックは解放される", () => {
            // Arrange
            vi.spyOn(bank, "makeTransaction").mockImplementation(() => {
                throw new Error("unexpected failure");
            });

            // Act & Assert
            expect(() => service.makeTransaction(MakeTransactionCommand.deposit(alice, Money.of(1)))).toThrow(
                "unexpected failure"
            );
            expect(mockBankLock.release).toHaveBeenCalledTimes(1);
        });
    });

    // ========================================
    // 照会
    // ========================================

    describe("照会", () => {
        it("残高照会: 口座があれば FOUND", () => {
            // Arrange
            const account = Account.checking(bob, "Bob", Money.of("12.50"));
            bank.addAccount(account);

            // Act
            const result = service.getAccountBalance(bob);

            // Assert
            expect(result).toEqual({status: "FOUND", account});
        });

        it("残高照会: 口座がなければ ACCOUNT_NOT_FOUND で、ロックも取引も発生しない", () => {
            // Act
            const result = service.getAccountBalance(new AccountNumber(999));

            // Assert
            expect(result.status).toBe("ACCOUNT_NOT_FOUND");
            expect(mockBankLock.acquire).not.toHaveBeenCalled();
            expect(bank.listTransactions()).toEqual([]);
        });

        it("取引一覧: 追加順に返る", () => {
            // Arrange
            bank.addAccount(Account.checking(bob, "Bob", Money.ZERO));
            service.makeTransaction(MakeTransactionCommand.deposit(bob, Money.of(10)));
            service.makeTransaction(MakeTransactionCommand.withdrawal(bob, Money.of(3)));

            // Act
            const listing = service.listTransactions();

            // Assert
            expect(listing.status).toBe("LISTED");
            if (listing.status === "LISTED") {
                expect(listing.transactions.map((t) => t.toString())).toEqual([
                    "Transaction 1: Deposit of 10.00 on 2024-03-01T12:00:00.000Z",
                    "Transaction 2: Withdrawal of 3.00 on 2024-03-01T12:00:00.000Z",
                ]);
            }
        });
    });
});
