/**
 * ZFS datasets
 *
 * One command per top-level dataset tree, so a failure in one tree does not
 * hide the others. Within a tree the catalog already lists parents first.
 * Existing datasets get their properties converged with `zfs set`.
 */

import type * as pulumi from "@pulumi/pulumi";
import { fullDatasetName, type Catalog, type DatasetSpec } from "@tankctl/shared";
import { runCommand, script } from "../lib/command.js";

export interface CreateDatasetsOptions {
    catalog: Catalog;
    dependsOn?: pulumi.Resource[];
}

export interface CreateDatasetsResult {
    resources: pulumi.Resource[];
    /** Full dataset names, in creation order */
    datasets: string[];
}

export function datasetCommand(catalog: Pick<Catalog, "pool">, dataset: DatasetSpec): string {
    const name = fullDatasetName(catalog, dataset.name);
    const converge = `recordsize=${dataset.recordsize} compression=${dataset.compression} atime=${dataset.atime}`;
    return script([
        `if zfs list -H -o name ${name} >/dev/null 2>&1; then`,
        `    zfs set ${converge} ${name}`,
        `    echo "Dataset ${name} exists, properties converged"`,
        "else",
        `    zfs create -o recordsize=${dataset.recordsize} -o compression=${dataset.compression} -o atime=${dataset.atime} -o xattr=${dataset.xattr} ${name}`,
        `    echo "Created dataset: ${name} (recordsize=${dataset.recordsize})"`,
        "fi",
    ]);
}

/**
 * Datasets grouped by their first path segment, keeping catalog order
 */
export function datasetTrees(datasets: readonly DatasetSpec[]): Map<string, DatasetSpec[]> {
    const trees = new Map<string, DatasetSpec[]>();
    for (const dataset of datasets) {
        const root = dataset.name.split("/")[0];
        const tree = trees.get(root);
        if (tree) {
            tree.push(dataset);
        } else {
            trees.set(root, [dataset]);
        }
    }
    return trees;
}

export function createDatasets(options: CreateDatasetsOptions): CreateDatasetsResult {
    const { catalog, dependsOn } = options;
    const resources: pulumi.Resource[] = [];

    for (const [root, tree] of datasetTrees(catalog.datasets)) {
        resources.push(
            runCommand({
                name: `datasets-${root}`,
                create: script([
                    "set -e",
                    ...tree.map((dataset) => datasetCommand(catalog, dataset)),
                ]),
                dependsOn,
            })
        );
    }

    return {
        resources,
        datasets: catalog.datasets.map((dataset) => fullDatasetName(catalog, dataset.name)),
    };
}
