import type { Account } from '../../../../application/domain/model/Account';
import { AccountNumber } from '../../../../application/domain/model/AccountNumber';
import type { TransactionOutcome } from '../../../../application/domain/model/Bank';
import { Money } from '../../../../application/domain/model/Money';
import type { Transaction, TransactionKind } from '../../../../application/domain/model/Transaction';
import { CreateAccountCommand } from '../../../../application/port/in/CreateAccountCommand';
import { MakeTransactionCommand } from '../../../../application/port/in/MakeTransactionCommand';
import type { AmountWebRequest, CreateAccountWebRequest } from '../models/BankWebRequest';
import type {
  AccountView,
  BankWebResponse,
  TransactionResultView,
  TransactionView,
} from '../models/BankWebResponse';

/**
 * Web層とアプリケーション層の間でモデルを変換するマッパー
 *
 * 責務：
 * - Webリクエストをドメインコマンドに変換
 * - ユースケースの結果をWebレスポンスに変換
 */

/**
 * 口座開設リクエストをCreateAccountCommandに変換
 */
export function toCreateAccountCommand(request: CreateAccountWebRequest): CreateAccountCommand {
  return new CreateAccountCommand(
    request.type,
    toAccountNumber(request.accountNumber),
    request.holderName,
    Money.of(request.initialBalance)
  );
}

/**
 * 入出金リクエストをMakeTransactionCommandに変換
 */
export function toTransactionCommand(
  accountNumber: string,
  request: AmountWebRequest,
  kind: TransactionKind
): MakeTransactionCommand {
  return new MakeTransactionCommand(toAccountNumber(accountNumber), Money.of(request.amount), kind);
}

export function toAccountNumber(value: string): AccountNumber {
  return new AccountNumber(Number(value));
}

export function toAccountView(account: Account): AccountView {
  return {
    accountNumber: account.getAccountNumber().toString(),
    holderName: account.getHolderName(),
    type: account.getType(),
    balance: account.getBalance().toString(),
  };
}

export function toTransactionView(transaction: Transaction): TransactionView {
  return {
    id: transaction.getId().getValue(),
    accountNumber: transaction.getAccountNumber().toString(),
    kind: transaction.getKind(),
    amount: transaction.getMoney().toString(),
    timestamp: transaction.getTimestamp().toISOString(),
    description: transaction.toString(),
  };
}

/**
 * 完了した取引の説明文
 *
 * 例:
 * - "Deposited 100.00 with interest 3.00. New Balance: 203.00"（普通預金）
 * - "Deposited 100.00. New Balance: 100.00"（当座預金）
 * - "Withdrawn 400.00. New Balance: -400.00"
 */
export function describeCompletedTransaction(
  outcome: Extract<TransactionOutcome, { status: 'COMPLETED' }>
): string {
  const amount = outcome.transaction.getMoney().toString();
  const balance = outcome.account.getBalance().toString();

  if (outcome.transaction.getKind() === 'Withdrawal') {
    return `Withdrawn ${amount}. New Balance: ${balance}`;
  }

  if (outcome.account.getType() === 'Savings') {
    return `Deposited ${amount} with interest ${outcome.interest.toString()}. New Balance: ${balance}`;
  }

  return `Deposited ${amount}. New Balance: ${balance}`;
}

export function toTransactionResultView(
  outcome: Extract<TransactionOutcome, { status: 'COMPLETED' }>
): TransactionResultView {
  return {
    summary: describeCompletedTransaction(outcome),
    interest: outcome.interest.toString(),
    transaction: toTransactionView(outcome.transaction),
    account: toAccountView(outcome.account),
  };
}

/**
 * 成功レスポンスを作成
 */
export function toSuccessResponse<T>(message: string, data: T): BankWebResponse<T> {
  return {
    success: true,
    message,
    data,
  };
}

/**
 * エラーレスポンスを作成
 */
export function toErrorResponse(
  message: string,
  code: string,
  details?: Record<string, unknown>
): BankWebResponse {
  return {
    success: false,
    message,
    error: {
      code,
      details,
    },
  };
}
