#!/usr/bin/env node
/**
 * idscan-cli
 * npm run idscan -- <command> [options]
 */

import * as dotenv from "dotenv";
import { errorMessage } from "idscan-core";
import { runCli } from "./commands.js";

dotenv.config();

runCli(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
