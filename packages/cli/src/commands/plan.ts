/**
 * plan command - Print the catalog stage by stage without contacting the NAS
 */

import type { CommandModule } from "yargs";
import {
    fullDatasetName,
    poolPath,
    selectStages,
    type ApplyStage,
    type Catalog,
} from "@tankctl/shared";
import { formatSchedule, snapshotTaskPayload } from "@tankctl/api";
import { catalogFromArgs, withCatalogOptions, type CatalogArgs } from "../utils/options.utils.js";
import { STAGE_TITLES } from "../utils/output.utils.js";

interface PlanArgs extends CatalogArgs {
    only?: string[];
    skip?: string[];
}

function stageRows(catalog: Catalog, stage: ApplyStage): string[] {
    switch (stage) {
        case "groups":
            return catalog.groups.map((g) => `${g.name} (${g.gid}): ${g.description}`);
        case "datasets":
            return catalog.datasets.map(
                (d) =>
                    `${fullDatasetName(catalog, d.name)} recordsize=${d.recordsize} compression=${d.compression} atime=${d.atime} xattr=${d.xattr}`
            );
        case "users":
            return [
                ...catalog.services.map((s) => `${s.name} (${s.uid}) group ${s.group}, home ${s.home}`),
                ...catalog.memberships.map((m) => `${m.user} +${m.group}`),
            ];
        case "permissions":
            return [
                ...catalog.permissions.map(
                    (p) =>
                        `${poolPath(catalog, p.path)} ${p.owner}:${p.group} ${p.mode}${p.recursive ? " recursive" : ""}`
                ),
                ...catalog.acls.map((a) => `${poolPath(catalog, a.path)} acl g:${a.group}:${a.perms}`),
            ];
        case "snapshots":
            return catalog.snapshotTasks.map((task) => {
                const payload = snapshotTaskPayload(catalog, task);
                return `${payload.dataset} ${payload.naming_schema} "${formatSchedule(payload.schedule)}" keep ${payload.lifetime_value} ${payload.lifetime_unit}`;
            });
        case "tunables":
            return catalog.tunables.map((t) => `${t.var}=${t.value} (${t.type})`);
    }
}

/**
 * One heading per stage with its row count, then one line per row
 */
export function renderPlan(catalog: Catalog, stages: readonly ApplyStage[]): string[] {
    const lines: string[] = [];
    for (const stage of stages) {
        const rows = stageRows(catalog, stage);
        lines.push(`=== ${STAGE_TITLES[stage]} (${rows.length}) ===`);
        lines.push(...rows.map((row) => `  ${row}`));
        lines.push("");
    }
    return lines;
}

export const planCommand: CommandModule<{}, PlanArgs> = {
    command: "plan",
    describe: "Show everything apply would provision, without contacting the NAS",
    builder: (yargs) =>
        withCatalogOptions(yargs)
            .option("only", {
                type: "string",
                array: true,
                describe: "Show only these stages",
            })
            .option("skip", {
                type: "string",
                array: true,
                describe: "Leave out these stages",
            }),
    handler: async (argv) => {
        const catalog = await catalogFromArgs(argv);
        const stages = selectStages(argv.only, argv.skip);
        for (const line of renderPlan(catalog, stages)) {
            console.log(line);
        }
    },
};
