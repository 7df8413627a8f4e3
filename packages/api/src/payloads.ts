/**
 * Mapping from catalog rows to middleware payloads, and the comparisons
 * used to decide whether a live record already matches.
 */

import { fullDatasetName, type Catalog, type DatasetSpec, type SnapshotTaskSpec } from "@tankctl/shared";
import type {
    CreateDatasetPayload,
    SnapshotTaskPayload,
    TrueNasDataset,
    TrueNasSnapshotTask,
    ZfsProperty,
} from "./types.js";

export const NOLOGIN_SHELL = "/usr/sbin/nologin";

export function datasetPayload(catalog: Pick<Catalog, "pool">, dataset: DatasetSpec): CreateDatasetPayload {
    return {
        name: fullDatasetName(catalog, dataset.name),
        type: "FILESYSTEM",
        recordsize: dataset.recordsize,
        compression: dataset.compression.toUpperCase(),
        atime: dataset.atime.toUpperCase(),
        xattr: dataset.xattr.toUpperCase(),
    };
}

/**
 * Properties of a live dataset that differ from the catalog
 */
export function datasetDifferences(
    dataset: DatasetSpec,
    live: TrueNasDataset
): Array<{ field: "recordsize" | "compression" | "atime"; expected: string; actual: string }> {
    const diffs: Array<{
        field: "recordsize" | "compression" | "atime";
        expected: string;
        actual: string;
    }> = [];
    const compare = (field: "recordsize" | "compression" | "atime", expected: string): void => {
        const actual = live[field].value;
        if (actual.toUpperCase() !== expected.toUpperCase()) {
            diffs.push({ field, expected, actual });
        }
    };
    compare("recordsize", dataset.recordsize);
    compare("compression", dataset.compression);
    compare("atime", dataset.atime);
    return diffs;
}

/**
 * Periodic snapshot task payload. Excludes only apply to recursive tasks;
 * the middleware rejects them otherwise.
 */
export function snapshotTaskPayload(
    catalog: Pick<Catalog, "pool">,
    task: SnapshotTaskSpec
): SnapshotTaskPayload {
    return {
        dataset: fullDatasetName(catalog, task.dataset),
        recursive: task.recursive,
        exclude: task.recursive ? task.exclude.map((name) => fullDatasetName(catalog, name)) : [],
        lifetime_value: task.lifetime.value,
        lifetime_unit: task.lifetime.unit,
        naming_schema: task.namingSchema,
        schedule: { ...task.schedule },
        allow_empty: task.allowEmpty,
        enabled: task.enabled,
    };
}

export function formatSchedule(schedule: SnapshotTaskPayload["schedule"]): string {
    return [schedule.minute, schedule.hour, schedule.dom, schedule.month, schedule.dow].join(" ");
}

export function formatLifetime(task: Pick<SnapshotTaskPayload, "lifetime_value" | "lifetime_unit">): string {
    return `${task.lifetime_value} ${task.lifetime_unit}`;
}

/**
 * Fields of a live snapshot task that differ from the payload we would send
 */
export function snapshotTaskDifferences(
    wanted: SnapshotTaskPayload,
    live: TrueNasSnapshotTask
): Array<{ field: string; expected: string; actual: string }> {
    const pairs: Array<[string, string, string]> = [
        ["schedule", formatSchedule(wanted.schedule), formatSchedule(live.schedule)],
        ["lifetime", formatLifetime(wanted), formatLifetime(live)],
        ["recursive", String(wanted.recursive), String(live.recursive)],
        ["exclude", wanted.exclude.join(","), live.exclude.join(",")],
        ["allow_empty", String(wanted.allow_empty), String(live.allow_empty)],
        ["enabled", String(wanted.enabled), String(live.enabled)],
    ];
    return pairs
        .filter(([, expected, actual]) => expected !== actual)
        .map(([field, expected, actual]) => ({ field, expected, actual }));
}

/**
 * Permission bits of st_mode as an octal string ("2775", "750")
 */
export function modeString(stMode: number): string {
    return (stMode & 0o7777).toString(8);
}

/**
 * Byte count of a space property; 0 when absent or not numeric
 */
export function propertyBytes(property: ZfsProperty | undefined): number {
    const bytes = Number(property?.rawvalue);
    return Number.isFinite(bytes) ? bytes : 0;
}

export function sameMode(expected: string, stMode: number): boolean {
    return parseInt(expected, 8) === (stMode & 0o7777);
}

export function indexBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T> {
    const map = new Map<string, T>();
    for (const item of items) {
        map.set(key(item), item);
    }
    return map;
}
