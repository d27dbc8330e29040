#!/usr/bin/env tsx
// w: TypeScript entry point

import { run } from "./cli.ts";

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`w: fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
