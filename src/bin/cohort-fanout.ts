#!/usr/bin/env node
import { runCli } from "../cli.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("interrupt: cancelling outstanding tasks");
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
