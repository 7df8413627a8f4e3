/**
 * tunables command - Validate the catalog's tunables and clean up after test runs
 *
 *   tankctl tunables validate   create, check and remove each tunable in turn
 *   tankctl tunables cleanup    remove tunables left behind by validation
 *   tankctl tunables purge      remove every tunable on the system
 */

import type { CommandModule } from "yargs";
import { confirm } from "@inquirer/prompts";
import { logInfo, logSection, logWarn, type Catalog } from "@tankctl/shared";
import {
    DEFAULT_RESULTS_FILE,
    findTestTunables,
    purgeTunables,
    validateTunables,
    writeValidationResults,
    type PurgeReport,
    type TrueNasClient,
    type TrueNasTunable,
} from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";

export const TUNABLE_ACTIONS = ["validate", "cleanup", "purge"] as const;
export type TunableAction = (typeof TUNABLE_ACTIONS)[number];

interface TunablesArgs extends ConnectionArgs {
    action: string;
    out: string;
    force: boolean;
}

function isTunableAction(value: string): value is TunableAction {
    return TUNABLE_ACTIONS.some((action) => action === value);
}

function describeTunable(tunable: TrueNasTunable): string {
    const comment = tunable.comment ? ` (${tunable.comment})` : "";
    return `  [${tunable.id}] ${tunable.var} = ${tunable.value}${comment}`;
}

export async function runTunablesValidate(
    client: TrueNasClient,
    catalog: Catalog,
    options: { out?: string } = {}
): Promise<number> {
    const out = options.out ?? DEFAULT_RESULTS_FILE;
    logSection("Tunable Validation");
    logInfo(`Testing ${catalog.tunables.length} tunables one at a time`);

    const report = await validateTunables(client, catalog.tunables, {
        onStart: (tunable, index, total) => {
            console.log(`[${index}/${total}] ${tunable.var} = ${tunable.value} (${tunable.type})`);
        },
        onResult: (check) => {
            if (check.valid) {
                const live = check.liveValue === undefined ? "" : ` (live value ${check.liveValue})`;
                console.log(`  ✓ valid${live}`);
            } else {
                console.log(`  ✗ invalid: ${check.reason ?? "unknown reason"}`);
            }
            if (check.cleanupIssue) {
                logWarn(`${check.tunable.var} was not removed: ${check.cleanupIssue}`);
            }
        },
        onWarning: logWarn,
    });

    await writeValidationResults(report, out);

    logSection("Validation Summary");
    console.log(`Valid:   ${report.valid.length}`);
    console.log(`Invalid: ${report.invalid.length}`);
    for (const check of report.invalid) {
        console.log(`  ✗ ${check.tunable.var}: ${check.reason ?? "unknown reason"}`);
    }
    console.log(`Results written to ${out}`);
    return report.invalid.length > 0 ? 1 : 0;
}

async function removeAfterConfirm(
    client: TrueNasClient,
    targets: TrueNasTunable[],
    question: string,
    force: boolean
): Promise<PurgeReport | undefined> {
    targets.forEach((tunable) => console.log(describeTunable(tunable)));
    console.log("");

    if (!force) {
        const proceed = await confirm({ message: question, default: false });
        if (!proceed) {
            console.log("Cancelled.");
            return undefined;
        }
    }

    return purgeTunables(client, targets, (tunable, ok, message) => {
        console.log(ok ? `  ✓ ${tunable.var}: ${message}` : `  ✗ ${tunable.var}: ${message}`);
    });
}

function reportPurge(report: PurgeReport): number {
    console.log("");
    console.log(`Removed ${report.deleted.length}, failed ${report.failed.length}`);
    return report.failed.length > 0 ? 1 : 0;
}

export async function runTunablesCleanup(
    client: TrueNasClient,
    catalog: Catalog,
    options: { force?: boolean } = {}
): Promise<number> {
    logSection("Test Tunable Cleanup");
    const targets = findTestTunables(
        await client.tunables.list(),
        catalog.tunables.map((t) => t.var)
    );
    if (targets.length === 0) {
        console.log("No test tunables found");
        return 0;
    }

    console.log(`Found ${targets.length} test tunable(s):`);
    const report = await removeAfterConfirm(
        client,
        targets,
        `Remove these ${targets.length} tunable(s)?`,
        options.force === true
    );
    return report ? reportPurge(report) : 0;
}

export async function runTunablesPurge(
    client: TrueNasClient,
    options: { force?: boolean } = {}
): Promise<number> {
    logSection("Tunable Purge");
    const targets = await client.tunables.list();
    if (targets.length === 0) {
        console.log("No tunables on the system");
        return 0;
    }

    console.log(`The system has ${targets.length} tunable(s):`);
    const report = await removeAfterConfirm(
        client,
        targets,
        `Delete ALL ${targets.length} tunables, including ones tankctl did not create?`,
        options.force === true
    );
    return report ? reportPurge(report) : 0;
}

export const tunablesCommand: CommandModule<{}, TunablesArgs> = {
    command: "tunables <action>",
    describe: "Validate tunables against the NAS, or remove leftover ones",
    builder: (yargs) =>
        withConnectionOptions(yargs)
            .positional("action", {
                type: "string",
                choices: TUNABLE_ACTIONS,
                demandOption: true,
                describe: "validate, cleanup or purge",
            })
            .option("out", {
                type: "string",
                default: DEFAULT_RESULTS_FILE,
                describe: "Where validate writes its results",
            })
            .option("force", {
                type: "boolean",
                default: false,
                describe: "Do not ask before removing tunables",
            }),
    handler: async (argv) => {
        const action = argv.action;
        if (!isTunableAction(action)) {
            throw new Error(`Unknown tunables action '${action}'`);
        }
        const { client, catalog } = await connectFromArgs(argv);
        switch (action) {
            case "validate":
                process.exitCode = await runTunablesValidate(client, catalog, { out: argv.out });
                break;
            case "cleanup":
                process.exitCode = await runTunablesCleanup(client, catalog, { force: argv.force });
                break;
            case "purge":
                process.exitCode = await runTunablesPurge(client, { force: argv.force });
                break;
        }
    },
};
