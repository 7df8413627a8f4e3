/**
 * snapshot command - On-demand snapshots and retention pruning
 *
 *   tankctl snapshot now              recursive manual-* snapshot of the critical set
 *   tankctl snapshot prune [--execute] delete snapshots older than each policy allows
 *   tankctl snapshot usage [--top N]   snapshot space per dataset and the largest snapshots
 */

import type { CommandModule } from "yargs";
import { fullDatasetName, logSection, type Catalog } from "@tankctl/shared";
import {
    DEFAULT_LARGEST_SNAPSHOTS,
    pruneSnapshots,
    snapshotNow,
    snapshotUsage,
    type TrueNasClient,
} from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";
import { formatBytes } from "../utils/output.utils.js";

export const SNAPSHOT_ACTIONS = ["now", "prune", "usage"] as const;
export type SnapshotAction = (typeof SNAPSHOT_ACTIONS)[number];

interface SnapshotArgs extends ConnectionArgs {
    action: string;
    execute: boolean;
    top: number;
}

function isSnapshotAction(value: string): value is SnapshotAction {
    return SNAPSHOT_ACTIONS.some((action) => action === value);
}

export async function runSnapshotNow(
    client: TrueNasClient,
    catalog: Catalog,
    now: Date = new Date()
): Promise<number> {
    logSection("Manual Snapshots");
    const results = await snapshotNow(client, catalog, now);

    const created = results.filter((r) => r.outcome === "created");
    const skipped = results.filter((r) => r.outcome === "skipped");
    const failed = results.filter((r) => r.outcome === "failed");
    for (const result of failed) {
        console.error(`  ✗ ${result.snapshot}: ${result.detail ?? "failed"}`);
    }
    console.log(`Created ${created.length}, skipped ${skipped.length}, failed ${failed.length}`);
    return failed.length > 0 ? 1 : 0;
}

export async function runSnapshotPrune(
    client: TrueNasClient,
    catalog: Catalog,
    options: { execute?: boolean; now?: Date } = {}
): Promise<number> {
    logSection(options.execute ? "Snapshot Prune" : "Snapshot Prune (dry run)");
    for (const policy of catalog.prunePolicies) {
        console.log(`  ${fullDatasetName(catalog, policy.dataset)}: keep ${policy.prefix}* for ${policy.keepDays} days`);
    }

    const result = await pruneSnapshots(client, catalog, options);
    if (result.candidates.length === 0) {
        console.log("Nothing to prune");
        return 0;
    }

    if (!result.executed) {
        for (const candidate of result.candidates) {
            console.log(`  would delete ${candidate.snapshot} (${candidate.ageDays} days old)`);
        }
        console.log(`${result.candidates.length} snapshot(s) would be deleted; rerun with --execute`);
        return 0;
    }

    for (const failure of result.failed) {
        console.error(`  ✗ ${failure.snapshot}: ${failure.message}`);
    }
    console.log(`Deleted ${result.deleted.length}, failed ${result.failed.length}`);
    return result.failed.length > 0 ? 1 : 0;
}

export async function runSnapshotUsage(
    client: TrueNasClient,
    catalog: Catalog,
    top: number = DEFAULT_LARGEST_SNAPSHOTS
): Promise<number> {
    logSection("Snapshot Space Usage");
    const report = await snapshotUsage(client, catalog, top);
    if (report.totalSnapshots === 0) {
        console.log(`No snapshots on ${catalog.pool}`);
        return 0;
    }

    console.log("By dataset:");
    for (const row of report.datasets) {
        console.log(`  ${row.dataset}: ${formatBytes(row.usedBySnapshots)} in ${row.snapshots} snapshot(s)`);
    }
    console.log(`Largest ${report.largest.length}:`);
    for (const snapshot of report.largest) {
        console.log(
            `  ${snapshot.snapshot}: ${formatBytes(snapshot.used)} used, ${formatBytes(snapshot.referenced)} referenced`
        );
    }
    console.log(`${report.totalSnapshots} snapshot(s) holding ${formatBytes(report.totalUsedBySnapshots)}`);
    return 0;
}

export const snapshotCommand: CommandModule<{}, SnapshotArgs> = {
    command: "snapshot <action>",
    describe: "Take manual snapshots, prune old ones or show their space usage",
    builder: (yargs) =>
        withConnectionOptions(yargs)
            .positional("action", {
                type: "string",
                choices: SNAPSHOT_ACTIONS,
                demandOption: true,
                describe: "now, prune or usage",
            })
            .option("execute", {
                type: "boolean",
                default: false,
                describe: "prune: actually delete (default is a dry run)",
            })
            .option("top", {
                type: "number",
                default: DEFAULT_LARGEST_SNAPSHOTS,
                describe: "usage: how many of the largest snapshots to list",
            }),
    handler: async (argv) => {
        const action = argv.action;
        if (!isSnapshotAction(action)) {
            throw new Error(`Unknown snapshot action '${action}'`);
        }
        const { client, catalog } = await connectFromArgs(argv);
        if (action === "now") {
            process.exitCode = await runSnapshotNow(client, catalog);
        } else if (action === "prune") {
            process.exitCode = await runSnapshotPrune(client, catalog, { execute: argv.execute });
        } else {
            process.exitCode = await runSnapshotUsage(client, catalog, argv.top);
        }
    },
};
