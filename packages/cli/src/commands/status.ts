/**
 * status command - Per-service dataset, ownership and shared access report
 */

import type { CommandModule } from "yargs";
import type { Catalog } from "@tankctl/shared";
import { serviceStatus, type TrueNasClient } from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";
import { printStatusReport } from "../utils/output.utils.js";

interface StatusArgs extends ConnectionArgs {
    json: boolean;
}

export async function runStatus(
    client: TrueNasClient,
    catalog: Catalog,
    options: { json?: boolean } = {}
): Promise<number> {
    const report = await serviceStatus(client, catalog);
    if (options.json) {
        console.log(JSON.stringify(report, null, 2));
    } else {
        printStatusReport(report);
    }
    return report.healthy ? 0 : 1;
}

export const statusCommand: CommandModule<{}, StatusArgs> = {
    command: "status",
    describe: "Check each service's dataset, ownership and shared access (exit 1 on problems)",
    builder: (yargs) =>
        withConnectionOptions(yargs).option("json", {
            type: "boolean",
            default: false,
            describe: "Print the report as JSON",
        }),
    handler: async (argv) => {
        const { client, catalog } = await connectFromArgs(argv, !argv.json);
        process.exitCode = await runStatus(client, catalog, { json: argv.json });
    },
};
