import type { AccountType } from '../../../../application/domain/model/AccountPolicy';
import type { TransactionKind } from '../../../../application/domain/model/Transaction';

/**
 * Web層専用のレスポンスモデル
 */
export interface BankWebResponse<T = undefined> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code: string;
    details?: Record<string, unknown>;
  };
}

export interface AccountView {
  accountNumber: string;
  holderName: string;
  type: AccountType;
  balance: string;
}

export interface TransactionView {
  id: number;
  accountNumber: string;
  kind: TransactionKind;
  amount: string;
  timestamp: string;
  description: string;
}

export interface TransactionResultView {
  summary: string;
  interest: string;
  transaction: TransactionView;
  account: AccountView;
}

export interface TransactionListView {
  transactions: TransactionView[];
}
