import { z } from 'zod';
import { ACCOUNT_TYPES } from '../../../../application/domain/model/AccountPolicy';

/**
 * Web層専用のリクエストモデル
 * プリミティブ型（文字列）のみを使用してドメインモデルへの依存を排除
 *
 * 金額は JSON の number ではなく10進数文字列で受け取る（"100.50" など）。
 * 符号の付いた値もここでは通し、0 以下かどうかはコマンド側で判定する。
 */
const INTEGER_PATTERN = /^-?\d+$/;

const accountNumberString = z
  .string()
  .regex(INTEGER_PATTERN, 'accountNumber must be an integer string')
  .refine((value) => !INTEGER_PATTERN.test(value) || Number.isSafeInteger(Number(value)), {
    message: 'accountNumber is too large',
  });

const decimalString = (field: string) =>
  z.string().regex(/^-?\d+(\.\d+)?$/, `${field} must be a decimal string`);

/**
 * 口座開設リクエスト（JSONボディ）
 */
export const CreateAccountWebRequestSchema = z.object({
  type: z.enum(ACCOUNT_TYPES),
  accountNumber: accountNumberString,
  // 名義人は受け取ったまま保存する（前後の空白も削らない）
  holderName: z.string().refine((value) => value.trim().length > 0, {
    message: 'holderName must not be empty',
  }),
  initialBalance: decimalString('initialBalance'),
});

export type CreateAccountWebRequest = z.infer<typeof CreateAccountWebRequestSchema>;

/**
 * 入出金リクエスト（JSONボディ）
 */
export const AmountWebRequestSchema = z.object({
  amount: decimalString('amount'),
});

export type AmountWebRequest = z.infer<typeof AmountWebRequestSchema>;

/**
 * パスパラメータ用のバリデーションスキーマ
 */
export const AccountNumberParamSchema = z.object({
  accountNumber: accountNumberString,
});
