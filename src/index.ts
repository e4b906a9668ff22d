#!/usr/bin/env node
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err) => {
    console.error("pr-review-cascade failed:", err);
    process.exit(1);
  },
);
