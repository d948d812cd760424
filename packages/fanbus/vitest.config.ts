import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "fanbus",
        include: ["src/**/*.spec.ts"],
        environment: "node",
        coverage: {
            provider: "istanbul",
        },
    },
});
