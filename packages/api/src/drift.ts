/**
 * Drift check: compares the catalog with what the NAS reports
 */

import { fullDatasetName, type Catalog } from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";
import {
    datasetDifferences,
    formatLifetime,
    formatSchedule,
    indexBy,
    snapshotTaskPayload,
} from "./payloads.js";

export type DriftKind = "group" | "user" | "dataset" | "snapshotTask" | "tunable";

export interface DriftEntry {
    kind: DriftKind;
    name: string;
    /** Set on mismatches */
    field?: string;
    expected?: string;
    actual?: string;
}

export interface DriftReport {
    missing: DriftEntry[];
    mismatch: DriftEntry[];
    clean: boolean;
}

export async function checkDrift(client: TrueNasClient, catalog: Catalog): Promise<DriftReport> {
    const missing: DriftEntry[] = [];
    const mismatch: DriftEntry[] = [];
    const differs = (
        kind: DriftKind,
        name: string,
        field: string,
        expected: string | number,
        actual: string | number
    ): void => {
        if (String(expected) !== String(actual)) {
            mismatch.push({ kind, name, field, expected: String(expected), actual: String(actual) });
        }
    };

    const groups = await client.groups.list();
    const groupsByName = indexBy(groups, (g) => g.group);
    for (const group of catalog.groups) {
        const live = groupsByName.get(group.name);
        if (!live) {
            missing.push({ kind: "group", name: group.name });
            continue;
        }
        differs("group", group.name, "gid", group.gid, live.gid);
    }

    const users = indexBy(await client.users.list(), (u) => u.username);
    const groupNamesById = new Map<number, string>();
    for (const group of groups) groupNamesById.set(group.id, group.group);
    for (const service of catalog.services) {
        const live = users.get(service.name);
        if (!live) {
            missing.push({ kind: "user", name: service.name });
            continue;
        }
        differs("user", service.name, "uid", service.uid, live.uid);
        differs("user", service.name, "home", service.home, live.home);
        differs("user", service.name, "group", service.group, live.group.bsdgrp_group);

        const liveGroups = new Set(live.groups.map((id) => groupNamesById.get(id)));
        const wanted = catalog.memberships.filter((m) => m.user === service.name).map((m) => m.group);
        const absent = wanted.filter((g) => !liveGroups.has(g));
        if (absent.length > 0) {
            mismatch.push({
                kind: "user",
                name: service.name,
                field: "groups",
                expected: wanted.join(","),
                actual: [...liveGroups].filter((g) => g !== undefined).join(","),
            });
        }
    }

    const datasets = indexBy(await client.datasets.list(), (d) => d.id);
    for (const dataset of catalog.datasets) {
        const name = fullDatasetName(catalog, dataset.name);
        const live = datasets.get(name);
        if (!live) {
            missing.push({ kind: "dataset", name });
            continue;
        }
        for (const diff of datasetDifferences(dataset, live)) {
            mismatch.push({ kind: "dataset", name, ...diff });
        }
    }

    const tasks = await client.snapshotTasks.list();
    for (const task of catalog.snapshotTasks) {
        const wanted = snapshotTaskPayload(catalog, task);
        const name = `${wanted.dataset} ${wanted.naming_schema}`;
        const live = tasks.find(
            (t) => t.dataset === wanted.dataset && t.naming_schema === wanted.naming_schema
        );
        if (!live) {
            missing.push({ kind: "snapshotTask", name });
            continue;
        }
        differs("snapshotTask", name, "schedule", formatSchedule(wanted.schedule), formatSchedule(live.schedule));
        differs("snapshotTask", name, "lifetime", formatLifetime(wanted), formatLifetime(live));
    }

    const tunables = indexBy(await client.tunables.list(), (t) => t.var);
    for (const tunable of catalog.tunables) {
        const live = tunables.get(tunable.var);
        if (!live) {
            missing.push({ kind: "tunable", name: tunable.var });
            continue;
        }
        differs("tunable", tunable.var, "value", tunable.value, live.value);
        if (!live.enabled) {
            mismatch.push({ kind: "tunable", name: tunable.var, field: "enabled", expected: "true", actual: "false" });
        }
    }

    return { missing, mismatch, clean: missing.length === 0 && mismatch.length === 0 };
}
