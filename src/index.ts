#!/usr/bin/env node
/**
 * discern CLI Entry Point
 */

import { runCLI } from "./cli.js";

runCLI(process.argv.slice(2), {
  out: (msg) => console.log(msg),
  err: (msg) => console.error(msg),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
