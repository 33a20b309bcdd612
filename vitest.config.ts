import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        // テストではデモ口座を登録しない（.env には依存しない）
        env: {
            SEED_DEMO_ACCOUNTS: "false",
        },
    },
});
