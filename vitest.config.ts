import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        // tsyringe は import 時に Reflect ポリフィルを要求する
        setupFiles: ["./test/setup.ts"],
        // 永続化テストはリトライ待機（50ms + 100ms）を含む
        testTimeout: 10_000,
    },
});
