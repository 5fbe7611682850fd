import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/**/*.test.ts"],
        env: {
            NODE_ENV: "test",
            FILE_LOGGING: "false",
        },
        coverage: {
            include: ["src/**/*.ts"],
            exclude: ["src/**/*.test.ts", "src/**/index.ts", "src/test-utils/**"],
        },
    },
});
