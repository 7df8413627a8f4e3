/**
 * apply command - Provision the NAS through the REST API
 *
 * Runs the apply stages in order; with --dry-run only reports what would
 * change. Stops at the first failed row unless --keep-going is given.
 */

import type { CommandModule } from "yargs";
import { logInfo, logSection, selectStages, type ApplyStage, type Catalog } from "@tankctl/shared";
import { applyCatalog, type ApplyReport, type TrueNasClient } from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";
import { STAGE_TITLES, formatResult, printApplySummary } from "../utils/output.utils.js";

interface ApplyArgs extends ConnectionArgs {
    only?: string[];
    skip?: string[];
    "dry-run": boolean;
    "keep-going": boolean;
    verbose: boolean;
}

export interface ApplyCommandOptions {
    stages: ApplyStage[];
    dryRun?: boolean;
    keepGoing?: boolean;
    /** Also print unchanged rows */
    verbose?: boolean;
}

/**
 * Runs the apply and prints progress and a summary; resolves to the exit code
 */
export async function runApply(
    client: TrueNasClient,
    catalog: Catalog,
    options: ApplyCommandOptions
): Promise<{ exitCode: number; report: ApplyReport }> {
    logSection(options.dryRun ? "Apply (dry run)" : "Apply");
    logInfo(`Pool: ${catalog.pool}`);
    logInfo(`Stages: ${options.stages.join(", ")}`);

    let currentStage: ApplyStage | undefined;
    const report = await applyCatalog(client, catalog, {
        stages: options.stages,
        dryRun: options.dryRun,
        keepGoing: options.keepGoing,
        onResult: (result) => {
            if (result.stage !== currentStage) {
                currentStage = result.stage;
                logSection(STAGE_TITLES[result.stage]);
            }
            if (result.outcome !== "unchanged" || options.verbose) {
                console.log(formatResult(result));
            }
        },
    });

    printApplySummary(report);

    const failed = report.results.filter((r) => r.outcome === "failed").length;
    if (report.aborted) {
        console.error("✗ Stopped at the first failure (--keep-going carries on past failed rows)");
    } else if (failed > 0) {
        console.error(`✗ ${failed} row(s) failed`);
    }
    return { exitCode: failed > 0 ? 1 : 0, report };
}

export const applyCommand: CommandModule<{}, ApplyArgs> = {
    command: "apply",
    describe: "Provision groups, datasets, users, permissions, snapshot tasks and tunables over the REST API",
    builder: (yargs) =>
        withConnectionOptions(yargs)
            .option("only", {
                type: "string",
                array: true,
                describe: "Run only these stages (comma-separated or repeated)",
            })
            .option("skip", {
                type: "string",
                array: true,
                describe: "Skip these stages",
            })
            .option("dry-run", {
                type: "boolean",
                default: false,
                describe: "Read only; report what would change",
            })
            .option("keep-going", {
                type: "boolean",
                default: false,
                describe: "Record failures and continue with the next row",
            })
            .option("verbose", {
                type: "boolean",
                default: false,
                describe: "Also list rows that are already in place",
            }),
    handler: async (argv) => {
        const stages = selectStages(argv.only, argv.skip);
        if (stages.length === 0) {
            throw new Error("No stages left to run after --only/--skip");
        }
        const { client, catalog } = await connectFromArgs(argv);
        const { exitCode } = await runApply(client, catalog, {
            stages,
            dryRun: argv.dryRun,
            keepGoing: argv.keepGoing,
            verbose: argv.verbose,
        });
        process.exitCode = exitCode;
    },
};
