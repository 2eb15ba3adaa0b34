#!/usr/bin/env -S node --import tsx

import process from "node:process";

import { loadEnv } from "./config/settings";
import { main } from "./commands";
import { errorMessage } from "./util";

loadEnv();

main(process.argv.slice(2), { stdout: (text) => process.stdout.write(text) }).catch((err: unknown) => {
  console.error(`FAIL: ${errorMessage(err)}`);
  process.exit(1);
});
