import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "fanbus-cli",
        include: ["src/**/*.spec.ts"],
        environment: "node",
    },
});
