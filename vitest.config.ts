import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // File store tests share the process-wide observer and registry
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
