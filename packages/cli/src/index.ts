#!/usr/bin/env node

/**
 * tankctl CLI
 *
 * Provisions a TrueNAS SCALE system from the catalog over the REST API.
 * Run `tankctl --help` for usage information.
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";

await runCli(hideBin(process.argv));
