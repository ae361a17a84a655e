#!/usr/bin/env node
import { run } from "./run.js";

const paths = process.argv.slice(2);

run(paths, {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exitCode = 2;
  });
