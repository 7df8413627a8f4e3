/**
 * tankctl command line
 *
 * Built separately from the entry point so tests can run it with their own
 * arguments. Handlers report failures by throwing; runCli prints them.
 */

import yargs, { type Argv } from "yargs";
import { applyCommand } from "./commands/apply.js";
import { bootstrapCommand } from "./commands/bootstrap.js";
import { driftCommand } from "./commands/drift.js";
import { exportCommand } from "./commands/export.js";
import { planCommand } from "./commands/plan.js";
import { setupCommand } from "./commands/setup.js";
import { snapshotCommand } from "./commands/snapshot.js";
import { statusCommand } from "./commands/status.js";
import { tunablesCommand } from "./commands/tunables.js";

export const CLI_VERSION = "0.1.0";

export function createCli(args: string[]): Argv {
    return yargs(args)
        .scriptName("tankctl")
        .usage("$0 <command> [options]")
        .command(setupCommand)
        .command(planCommand)
        .command(applyCommand)
        .command(driftCommand)
        .command(statusCommand)
        .command(tunablesCommand)
        .command(snapshotCommand)
        .command(exportCommand)
        .command(bootstrapCommand)
        .demandCommand(1, "Please specify a command. Run tankctl --help for available commands.")
        .strict()
        .fail(false)
        .help()
        .alias("h", "help")
        .version(CLI_VERSION)
        .alias("v", "version");
}

/**
 * Parses and runs one command line; any error ends up as "✗ message" on
 * stderr and exit code 1
 */
export async function runCli(args: string[]): Promise<void> {
    try {
        await createCli(args).parseAsync();
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`✗ ${message}`);
        process.exitCode = 1;
    }
}
