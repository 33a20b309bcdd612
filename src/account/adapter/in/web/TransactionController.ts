import {Hono} from 'hono';
import {container} from 'tsyringe';
import type {ListTransactionsQuery} from '../../../application/port/in/ListTransactionsQuery';
import {ListTransactionsQueryToken} from '../../../application/port/in/ListTransactionsQuery';
import {toSuccessResponse, toTransactionView} from './mappers/BankWebMapper';
import type {TransactionListView} from './models/BankWebResponse';

export const transactionRouter = new Hono();

/**
 * GET /api/transactions
 * 台帳の取引を追加順に返す
 */
transactionRouter.get('/transactions', (c): Response => {
    const query = container.resolve<ListTransactionsQuery>(ListTransactionsQueryToken);
    const listing = query.listTransactions();

    if (listing.status === 'EMPTY') {
        const empty: TransactionListView = {transactions: []};
        return c.json(toSuccessResponse('No transactions to show.', empty), 200);
    }

    const view: TransactionListView = {transactions: listing.transactions.map(toTransactionView)};
    return c.json(
        toSuccessResponse(`Transaction count: ${String(view.transactions.length)}`, view),
        200
    );
});
