import 'reflect-metadata';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import {accountRouter} from './account/adapter/in/web/AccountController';
import {transactionRouter} from './account/adapter/in/web/TransactionController';
import type {Bank} from './account/application/domain/model/Bank';
import {initializeApplication, isApplicationInitialized} from './config/app-initializer';
import {loadEnvironment} from './config/environment';
import {BankToken} from './config/types';

const app = new Hono();

// ルートエンドポイント
app.get('/', (c) => {
    return c.json({
        message: 'Retail Bank API - Hexagonal Architecture with Hono + TypeScript',
        version: '1.0.0',
        endpoints: {
            createAccount: 'POST /api/accounts',
            deposit: 'POST /api/accounts/:accountNumber/deposits',
            withdraw: 'POST /api/accounts/:accountNumber/withdrawals',
            getBalance: 'GET /api/accounts/:accountNumber/balance',
            listTransactions: 'GET /api/transactions',
        },
    });
});

// 初期化処理を app-initializer に委譲（環境変数の検証は初回のみ）
app.use('*', async (_c, next) => {
    if (!isApplicationInitialized()) {
        initializeApplication(loadEnvironment());
    }
    await next();
});

// APIルーターをマウント
app.route('/api', accountRouter);
app.route('/api', transactionRouter);

// ヘルスチェックエンドポイント
app.get('/health', (c) => {
    const bank = container.resolve<Bank>(BankToken);
    return c.json({
        status: 'healthy',
        bank: {
            accounts: bank.getAccountCount(),
            transactions: bank.listTransactions().length,
        },
    });
});

export default app;
