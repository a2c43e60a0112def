import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            "@core": fromRoot("./src/core"),
            "@feed": fromRoot("./src/features/feed"),
            "@board": fromRoot("./src/features/board"),
            "@shared": fromRoot("./src/shared"),
            "@test": fromRoot("./src/test"),
        },
    },
    test: {
        include: ["src/**/*.test.ts"],
        environment: "node",
    },
});
