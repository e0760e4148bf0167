import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/api/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      UPLOAD_TMP_DIR: path.join(os.tmpdir(), "tapeloop-test"),
      UPLOAD_STATE_BACKEND: "memory",
      SCANNER: "disabled",
    },
    testTimeout: 15_000,
  },
});
