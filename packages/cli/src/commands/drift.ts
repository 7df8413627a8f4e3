/**
 * drift command - Compare the NAS with the catalog without changing anything
 */

import type { CommandModule } from "yargs";
import type { Catalog } from "@tankctl/shared";
import { checkDrift, type TrueNasClient } from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";
import { printDriftReport } from "../utils/output.utils.js";

interface DriftArgs extends ConnectionArgs {
    json: boolean;
}

export async function runDrift(
    client: TrueNasClient,
    catalog: Catalog,
    options: { json?: boolean } = {}
): Promise<number> {
    const report = await checkDrift(client, catalog);
    if (options.json) {
        console.log(JSON.stringify(report, null, 2));
    } else {
        printDriftReport(report);
        if (!report.clean) {
            console.log("");
            console.log(`${report.missing.length} missing, ${report.mismatch.length} mismatched`);
        }
    }
    return report.clean ? 0 : 1;
}

export const driftCommand: CommandModule<{}, DriftArgs> = {
    command: "drift",
    describe: "Report what on the NAS differs from the catalog (exit 1 on drift)",
    builder: (yargs) =>
        withConnectionOptions(yargs).option("json", {
            type: "boolean",
            default: false,
            describe: "Print the report as JSON",
        }),
    handler: async (argv) => {
        const { client, catalog } = await connectFromArgs(argv, !argv.json);
        process.exitCode = await runDrift(client, catalog, { json: argv.json });
    },
};
