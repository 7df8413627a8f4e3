/**
 * export command - Write a helper file from the catalog
 *
 * reference: users/groups reference for operators
 * env: UID/GID variables for Docker Compose
 * snapshot-tasks: periodic snapshot tasks in API field names, for import
 */

import { writeFile } from "node:fs/promises";
import type { CommandModule } from "yargs";
import {
    logInfo,
    renderDockerEnv,
    renderReference,
    renderSnapshotTasksJson,
    type Catalog,
} from "@tankctl/shared";
import { catalogFromArgs, withCatalogOptions, type CatalogArgs } from "../utils/options.utils.js";

export const EXPORT_KINDS = ["reference", "env", "snapshot-tasks"] as const;
export type ExportKind = (typeof EXPORT_KINDS)[number];

interface ExportArgs extends CatalogArgs {
    kind: string;
    out?: string;
}

export function isExportKind(value: string): value is ExportKind {
    return EXPORT_KINDS.some((kind) => kind === value);
}

export function renderExport(catalog: Catalog, kind: ExportKind, generatedAt: Date = new Date()): string {
    switch (kind) {
        case "reference":
            return renderReference(catalog, generatedAt);
        case "env":
            return renderDockerEnv(catalog);
        case "snapshot-tasks":
            return renderSnapshotTasksJson(catalog);
    }
}

export async function runExport(catalog: Catalog, kind: ExportKind, out?: string): Promise<void> {
    const content = renderExport(catalog, kind);
    if (!out) {
        process.stdout.write(content);
        return;
    }
    await writeFile(out, content, "utf8");
    logInfo(`Wrote ${kind} to ${out}`);
}

export const exportCommand: CommandModule<{}, ExportArgs> = {
    command: "export <kind>",
    describe: "Print a helper file (reference, env or snapshot-tasks)",
    builder: (yargs) =>
        withCatalogOptions(yargs)
            .positional("kind", {
                type: "string",
                choices: EXPORT_KINDS,
                demandOption: true,
                describe: "Which file to render",
            })
            .option("out", {
                type: "string",
                alias: "o",
                describe: "Write to this file instead of stdout",
            }),
    handler: async (argv) => {
        const kind = argv.kind;
        if (!isExportKind(kind)) {
            throw new Error(`Unknown export kind '${kind}'`);
        }
        const catalog = await catalogFromArgs(argv);
        await runExport(catalog, kind, argv.out);
    },
};
