import { z } from 'zod';
import { InvalidAmountException } from '../../domain/exception/InvalidAmountException';
import { AccountNumber } from '../../domain/model/AccountNumber';
import { Money } from '../../domain/model/Money';
import type { TransactionKind } from '../../domain/model/Transaction';
import { TRANSACTION_KINDS } from '../../domain/model/Transaction';

/**
 * 入出金コマンドのバリデーションスキーマ
 */
const MakeTransactionCommandSchema = z.object({
  accountNumber: z.custom<AccountNumber>((val) => val instanceof AccountNumber, {
    message: 'accountNumber must be an AccountNumber instance',
  }),
  money: z.custom<Money>((val) => val instanceof Money, {
    message: 'money must be a Money instance',
  }),
  kind: z.enum(TRANSACTION_KINDS),
});

/**
 * 入出金コマンド
 * 不変オブジェクトとして実装
 */
export class MakeTransactionCommand {
  constructor(
    public readonly accountNumber: AccountNumber,
    public readonly money: Money,
    public readonly kind: TransactionKind
  ) {
    const result = MakeTransactionCommandSchema.safeParse({
      accountNumber,
      money,
      kind,
    });

    if (!result.success) {
      throw new Error(
        `Invalid MakeTransactionCommand: ${result.error.issues.map((e) => e.message).join(', ')}`
      );
    }

    // 0 以下の入出金は受け付けない
    // ドメインの Account.deposit() 自体は金額を検査しないので、ここが境界になる
    if (!money.isPositive()) {
      throw new InvalidAmountException('amount', money, 'must be positive');
    }
  }

  static deposit(accountNumber: AccountNumber, money: Money): MakeTransactionCommand {
    return new MakeTransactionCommand(accountNumber, money, 'Deposit');
  }

  static withdrawal(accountNumber: AccountNumber, money: Money): MakeTransactionCommand {
    return new MakeTransactionCommand(accountNumber, money, 'Withdrawal');
  }
}
