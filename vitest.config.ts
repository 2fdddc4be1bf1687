import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@tiltcard/card-core": packageEntry("card-core"),
      "@tiltcard/control-core": packageEntry("control-core"),
      "@tiltcard/gesture-core": packageEntry("gesture-core"),
      "@tiltcard/card-three": packageEntry("card-three"),
      "@tiltcard/card-react": packageEntry("card-react"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
  },
});
