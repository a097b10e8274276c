#!/usr/bin/env node
import { main } from "./cli";
import { describeError } from "./errors";
import { statusWarn } from "./ui";

main(process.argv)
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(statusWarn(describeError(error)));
    process.exit(1);
  });
