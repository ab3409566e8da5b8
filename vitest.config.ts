import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["impl/src/test/**/*.test.ts"],
        //the wasm solver starts worker threads of its own
        pool: "forks",
        testTimeout: 60000,
        hookTimeout: 60000
    }
});
