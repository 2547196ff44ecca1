#!/usr/bin/env node
/**
 * linefreq CLI
 */

import { run } from "./run";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
