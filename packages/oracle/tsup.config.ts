import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  // The engine workspace publishes its TypeScript sources, so the bin carries it bundled
  noExternal: ["@cipherscore/engine"],
  // better-sqlite3 loads a native binding; tweetnacl has dynamic requires that break when bundled into ESM
  external: ["better-sqlite3", "tweetnacl"],
});
