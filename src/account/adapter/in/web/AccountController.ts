import {zValidator} from '@hono/zod-validator';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import {InvalidAmountException} from '../../../application/domain/exception/InvalidAmountException';
import {withdrawalFloor} from '../../../application/domain/model/AccountPolicy';
import type {TransactionKind} from '../../../application/domain/model/Transaction';
import type {CreateAccountUseCase} from '../../../application/port/in/CreateAccountUseCase';
import {CreateAccountUseCaseToken} from '../../../application/port/in/CreateAccountUseCase';
import type {GetAccountBalanceQuery} from '../../../application/port/in/GetAccountBalanceQuery';
import {GetAccountBalanceQueryToken} from '../../../application/port/in/GetAccountBalanceQuery';
import type {MakeTransactionUseCase} from '../../../application/port/in/MakeTransactionUseCase';
import {MakeTransactionUseCaseToken} from '../../../application/port/in/MakeTransactionUseCase';
import {
    toAccountNumber,
    toAccountView,
    toCreateAccountCommand,
    toErrorResponse,
    toSuccessResponse,
    toTransactionCommand,
    toTransactionResultView,
} from './mappers/BankWebMapper';
import type {AmountWebRequest} from './models/BankWebRequest';
import {AccountNumberParamSchema, AmountWebRequestSchema, CreateAccountWebRequestSchema} from './models/BankWebRequest';
import type {BankWebResponse, TransactionResultView} from './models/BankWebResponse';
import {rejectInvalidRequest} from './validation';

export const accountRouter = new Hono();

/**
 * POST /api/accounts
 * JSONボディで口座開設リクエストを受け付ける
 */
accountRouter.post(
    '/accounts',
    zValidator('json', CreateAccountWebRequestSchema, rejectInvalidRequest),
    (c): Response => {
        try {
            // 1. リクエストボディからバリデーション済みデータを取得
            const request = c.req.valid('json');

            // 2. DIコンテナからユースケースを取得
            const createAccountUseCase = container.resolve<CreateAccountUseCase>(CreateAccountUseCaseToken);

            // 3. Webリクエストをドメインコマンドに変換（不正な金額はここで例外）
            const command = toCreateAccountCommand(request);

            // 4. ユースケースを実行
            const outcome = createAccountUseCase.createAccount(command);

            if (outcome.status === 'DUPLICATE_ACCOUNT_NUMBER') {
                return c.json(
                    toErrorResponse(
                        `Account number ${request.accountNumber} is already in use.`,
                        'DUPLICATE_ACCOUNT_NUMBER',
                        {
                            accountNumber: request.accountNumber,
                            holderName: outcome.existing.getHolderName(),
                        }
                    ),
                    409
                );
            }

            const account = outcome.account;
            return c.json(
                toSuccessResponse(
                    `Account ${account.getAccountNumber().toString()} added for ${account.getHolderName()}.`,
                    toAccountView(account)
                ),
                201
            );
        } catch (error) {
            const failure = toFailure(error);
            return c.json(failure.body, failure.status);
        }
    }
);

/**
 * GET /api/accounts/:accountNumber/balance
 * 残高照会
 */
accountRouter.get(
    '/accounts/:accountNumber/balance',
    zValidator('param', AccountNumberParamSchema, rejectInvalidRequest),
    (c): Response => {
        const {accountNumber} = c.req.valid('param');
        const query = container.resolve<GetAccountBalanceQuery>(GetAccountBalanceQueryToken);

        const result = query.getAccountBalance(toAccountNumber(accountNumber));

        if (result.status === 'ACCOUNT_NOT_FOUND') {
            return c.json(
                toErrorResponse('Account not found.', 'ACCOUNT_NOT_FOUND', {accountNumber}),
                404
            );
        }

        const account = result.account;
        return c.json(
            toSuccessResponse(
                `Account ${account.getAccountNumber().toString()} belonging to ${account.getHolderName()} ` +
                `has a balance of ${account.getBalance().toString()}`,
                toAccountView(account)
            ),
            200
        );
    }
);

/**
 * POST /api/accounts/:accountNumber/deposits
 * 入金
 */
accountRouter.post(
    '/accounts/:accountNumber/deposits',
    zValidator('param', AccountNumberParamSchema, rejectInvalidRequest),
    zValidator('json', AmountWebRequestSchema, rejectInvalidRequest),
    (c): Response => {
        const {accountNumber} = c.req.valid('param');
        const result = runTransaction(accountNumber, c.req.valid('json'), 'Deposit');
        return c.json(result.body, result.status);
    }
);

/**
 * POST /api/accounts/:accountNumber/withdrawals
 * 出金
 */
accountRouter.post(
    '/accounts/:accountNumber/withdrawals',
    zValidator('param', AccountNumberParamSchema, rejectInvalidRequest),
    zValidator('json', AmountWebRequestSchema, rejectInvalidRequest),
    (c): Response => {
        const {accountNumber} = c.req.valid('param');
        const result = runTransaction(accountNumber, c.req.valid('json'), 'Withdrawal');
        return c.json(result.body, result.status);
    }
);

type TransactionHttpResult =
    | { status: 200; body: BankWebResponse<TransactionResultView> }
    | { status: 400 | 404 | 500; body: BankWebResponse };

/**
 * 入金・出金の共通処理
 *
 * ユースケースの結果（status）を HTTP ステータスとレスポンスに対応付ける
 */
function runTransaction(
    accountNumber: string,
    request: AmountWebRequest,
    kind: TransactionKind
): TransactionHttpResult {
    try {
        const makeTransactionUseCase = container.resolve<MakeTransactionUseCase>(MakeTransactionUseCaseToken);
        const command = toTransactionCommand(accountNumber, request, kind);
        const outcome = makeTransactionUseCase.makeTransaction(command);

        switch (outcome.status) {
            case 'COMPLETED':
                return {
                    status: 200,
                    body: toSuccessResponse('Transaction successful.', toTransactionResultView(outcome)),
                };

            // ===== ビジネスルールによる失敗 =====

            case 'ACCOUNT_NOT_FOUND':
                return {
                    status: 404,
                    body: toErrorResponse('Account not found!', 'ACCOUNT_NOT_FOUND', {accountNumber}),
                };

            case 'INSUFFICIENT_FUNDS':
                return {
                    status: 400,
                    body: toErrorResponse('Insufficient funds!', 'INSUFFICIENT_FUNDS', {
                        accountNumber,
                        attemptedAmount: command.money.toString(),
                        currentBalance: outcome.account.getBalance().toString(),
                    }),
                };

            case 'OVERDRAFT_LIMIT_REACHED':
                return {
                    status: 400,
                    body: toErrorResponse('Overdraft limit reached!', 'OVERDRAFT_LIMIT_REACHED', {
                        accountNumber,
                        attemptedAmount: command.money.toString(),
                        currentBalance: outcome.account.getBalance().toString(),
                        floor: withdrawalFloor(outcome.account.getType()).toString(),
                    }),
                };
        }
    } catch (error) {
        return toFailure(error);
    }
}

function toFailure(error: unknown): Extract<TransactionHttpResult, { status: 400 | 404 | 500 }> {
    // 不正な金額（0 以下、マイナスの初期残高）
    if (error instanceof InvalidAmountException) {
        return {
            status: 400,
            body: toErrorResponse(error.message, 'INVALID_AMOUNT', {
                field: error.field,
                amount: error.amount.toString(),
            }),
        };
    }

    // 予期しないエラー（バグ等）
    console.error('Unexpected error:', error);

    const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';

    return {
        status: 500,
        body: toErrorResponse(errorMessage, 'INTERNAL_ERROR'),
    };
}
