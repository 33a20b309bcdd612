import { z } from 'zod';
import { InvalidAmountException } from '../../domain/exception/InvalidAmountException';
import { AccountNumber } from '../../domain/model/AccountNumber';
import type { AccountType } from '../../domain/model/AccountPolicy';
import { ACCOUNT_TYPES } from '../../domain/model/AccountPolicy';
import { Money } from '../../domain/model/Money';

/**
 * 口座開設コマンドのバリデーションスキーマ
 */
const CreateAccountCommandSchema = z.object({
  type: z.enum(ACCOUNT_TYPES),
  accountNumber: z.custom<AccountNumber>((val) => val instanceof AccountNumber, {
    message: 'accountNumber must be an AccountNumber instance',
  }),
  holderName: z.string().refine((value) => value.trim().length > 0, {
    message: 'holderName must not be empty',
  }),
  initialBalance: z.custom<Money>((val) => val instanceof Money, {
    message: 'initialBalance must be a Money instance',
  }),
});

/**
 * 口座開設コマンド
 * 不変オブジェクトとして実装
 */
export class CreateAccountCommand {
  constructor(
    public readonly type: AccountType,
    public readonly accountNumber: AccountNumber,
    public readonly holderName: string,
    public readonly initialBalance: Money
  ) {
    const result = CreateAccountCommandSchema.safeParse({
      type,
      accountNumber,
      holderName,
      initialBalance,
    });

    if (!result.success) {
      throw new Error(
        `Invalid CreateAccountCommand: ${result.error.issues.map((e) => e.message).join(', ')}`
      );
    }

    // 開設時点でマイナス残高の口座は作らない（ビジネスルール）
    if (initialBalance.isNegative()) {
      throw new InvalidAmountException('initialBalance', initialBalance, 'must not be negative');
    }
  }
}
