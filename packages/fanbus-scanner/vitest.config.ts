import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "fanbus-scanner",
        include: ["src/**/*.spec.ts"],
        environment: "node",
    },
});
