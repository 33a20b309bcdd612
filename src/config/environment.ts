import { z } from 'zod';

/**
 * 環境変数のスキーマ
 *
 * .env（dotenv）または実際の環境変数から読み込む。
 * - PORT: HTTPサーバーのポート番号
 * - HOST: 待ち受けるホスト名
 * - SEED_DEMO_ACCOUNTS: 'true' ならデモ用口座を2つ登録した状態で起動
 */
const AppEnvironmentSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().min(1).default('localhost'),
    SEED_DEMO_ACCOUNTS: z
        .enum(['true', 'false'])
        .default('false')
        .transform((value) => value === 'true'),
});

export type AppEnvironment = z.infer<typeof AppEnvironmentSchema>;

/**
 * 環境変数を検証して AppEnvironment に変換
 *
 * @throws Error 値が不正な場合（どの変数が不正かをメッセージに含める）
 */
export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): AppEnvironment {
    const result = AppEnvironmentSchema.safeParse({
        PORT: source.PORT,
        HOST: source.HOST,
        SEED_DEMO_ACCOUNTS: source.SEED_DEMO_ACCOUNTS,
    });

    if (!result.success) {
        throw new Error(
            `Invalid environment: ${result.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join(', ')}`
        );
    }

    return result.data;
}
