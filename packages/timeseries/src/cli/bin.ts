#!/usr/bin/env node
import { main } from "./waitq.js";

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`[waitq] ERROR: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exitCode = 1;
  }
);
