import type {Context} from 'hono';
import type {ZodError} from 'zod';
import {toErrorResponse} from './mappers/BankWebMapper';

/**
 * zValidator のフック
 *
 * バリデーションに失敗したリクエストも、他のエラーと同じ
 * { success: false, message, error: { code, details } } の形で 400 を返す。
 * 成功時は何も返さず、次のハンドラに進む。
 */
export function rejectInvalidRequest(
    result: { success: true } | { success: false; error: ZodError },
    c: Context
): Response | undefined {
    if (result.success) {
        return undefined;
    }

    const issues = result.error.issues;
    return c.json(
        toErrorResponse(
            `Invalid request: ${issues.map((issue) => issue.message).join(', ')}`,
            'VALIDATION_ERROR',
            {issues}
        ),
        400
    );
}
