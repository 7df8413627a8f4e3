/**
 * On-demand snapshots and retention pruning
 */

import {
    fullDatasetName,
    logInfo,
    logWarn,
    manualSnapshotServices,
    type Catalog,
    type PrunePolicy,
} from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";
import { propertyBytes } from "./payloads.js";
import type { TrueNasDataset, TrueNasSnapshot } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/**
 * Snapshot name for a manual run: manual-YYYYMMDD-HHMMSS (local time)
 */
export function manualSnapshotName(now: Date): string {
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `manual-${date}-${time}`;
}

export interface SnapshotNowResult {
    dataset: string;
    snapshot: string;
    outcome: "created" | "skipped" | "failed";
    detail?: string;
}

/**
 * Takes a recursive snapshot of every dataset in the manual snapshot set.
 * Datasets that do not exist are skipped.
 */
export async function snapshotNow(
    client: TrueNasClient,
    catalog: Catalog,
    now: Date = new Date()
): Promise<SnapshotNowResult[]> {
    const name = manualSnapshotName(now);
    const results: SnapshotNowResult[] = [];

    for (const service of manualSnapshotServices(catalog)) {
        const dataset = fullDatasetName(catalog, service.dataset);
        const snapshot = `${dataset}@${name}`;
        if (!(await client.datasets.get(dataset))) {
            logWarn(`Dataset ${dataset} does not exist, skipping`);
            results.push({ dataset, snapshot, outcome: "skipped", detail: "dataset missing" });
            continue;
        }
        try {
            await client.snapshots.create({ dataset, name, recursive: true });
            logInfo(`Created snapshot: ${snapshot}`);
            results.push({ dataset, snapshot, outcome: "created" });
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            results.push({ dataset, snapshot, outcome: "failed", detail });
        }
    }
    return results;
}

/**
 * Date embedded in a snapshot name as 8 digits (YYYYMMDD), as UTC midnight
 */
export function snapshotDate(snapshotName: string): Date | undefined {
    const match = /(\d{4})(\d{2})(\d{2})/.exec(snapshotName);
    if (!match) return undefined;
    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // Reject digit runs that are not calendar dates, e.g. 20241340
    if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
        return undefined;
    }
    return date;
}

export interface PruneCandidate {
    snapshot: string;
    dataset: string;
    policy: PrunePolicy;
    /** Whole days, for display only */
    ageDays: number;
}

/**
 * Picks the snapshots each policy would remove: on the policy's dataset,
 * named "<dataset>@<prefix>...", dated more than keepDays ago
 */
export function planPrune(
    snapshots: readonly Pick<TrueNasSnapshot, "id">[],
    policies: readonly PrunePolicy[],
    pool: string,
    now: Date = new Date()
): PruneCandidate[] {
    const candidates: PruneCandidate[] = [];
    for (const policy of policies) {
        const dataset = fullDatasetName({ pool }, policy.dataset);
        const prefix = `${dataset}@${policy.prefix}`;
        for (const { id } of snapshots) {
            if (!id.startsWith(prefix)) continue;
            const date = snapshotDate(id.slice(dataset.length + 1));
            if (!date) continue;
            const ageMs = now.getTime() - date.getTime();
            if (ageMs > policy.keepDays * MS_PER_DAY) {
                candidates.push({ snapshot: id, dataset, policy, ageDays: Math.floor(ageMs / MS_PER_DAY) });
            }
        }
    }
    return candidates;
}

export interface PruneResult {
    candidates: PruneCandidate[];
    deleted: string[];
    failed: Array<{ snapshot: string; message: string }>;
    executed: boolean;
}

/**
 * Applies the catalog's prune policies; only lists candidates unless execute is set
 */
export async function pruneSnapshots(
    client: TrueNasClient,
    catalog: Catalog,
    options: { execute?: boolean; now?: Date } = {}
): Promise<PruneResult> {
    const snapshots: TrueNasSnapshot[] = [];
    for (const policy of catalog.prunePolicies) {
        snapshots.push(...(await client.snapshots.list(fullDatasetName(catalog, policy.dataset))));
    }

    const candidates = planPrune(snapshots, catalog.prunePolicies, catalog.pool, options.now);
    const result: PruneResult = { candidates, deleted: [], failed: [], executed: options.execute === true };
    if (!result.executed) return result;

    for (const candidate of candidates) {
        try {
            await client.snapshots.delete(candidate.snapshot);
            logInfo(`Deleted snapshot: ${candidate.snapshot}`);
            result.deleted.push(candidate.snapshot);
        } catch (err) {
            result.failed.push({
                snapshot: candidate.snapshot,
                message: err instanceof Error ? err.message : String(err),
            });
        }
    }
    return result;
}

export const DEFAULT_LARGEST_SNAPSHOTS = 10;

export interface DatasetSnapshotUsage {
    dataset: string;
    snapshots: number;
    /** Bytes held only by this dataset's snapshots */
    usedBySnapshots: number;
}

export interface SnapshotSize {
    snapshot: string;
    used: number;
    referenced: number;
}

export interface SnapshotUsageReport {
    /** Datasets of the pool that have snapshots, largest first */
    datasets: DatasetSnapshotUsage[];
    largest: SnapshotSize[];
    totalSnapshots: number;
    totalUsedBySnapshots: number;
}

function bySizeThenName<T>(size: (item: T) => number, name: (item: T) => string): (a: T, b: T) => number {
    return (a, b) => size(b) - size(a) || name(a).localeCompare(name(b));
}

/**
 * Groups the pool's snapshots by dataset and picks the largest ones
 */
export function summarizeSnapshotUsage(
    datasets: readonly Pick<TrueNasDataset, "name" | "usedbysnapshots">[],
    snapshots: readonly Pick<TrueNasSnapshot, "id" | "dataset" | "properties">[],
    pool: string,
    top: number = DEFAULT_LARGEST_SNAPSHOTS
): SnapshotUsageReport {
    const inPool = (name: string): boolean => name === pool || name.startsWith(`${pool}/`);
    const poolSnapshots = snapshots.filter((s) => inPool(s.dataset));

    const counts = new Map<string, number>();
    for (const snapshot of poolSnapshots) {
        counts.set(snapshot.dataset, (counts.get(snapshot.dataset) ?? 0) + 1);
    }

    const rows: DatasetSnapshotUsage[] = datasets
        .filter((d) => counts.has(d.name))
        .map((d) => ({
            dataset: d.name,
            snapshots: counts.get(d.name) ?? 0,
            usedBySnapshots: propertyBytes(d.usedbysnapshots),
        }))
        .sort(bySizeThenName((r) => r.usedBySnapshots, (r) => r.dataset));

    const largest: SnapshotSize[] = poolSnapshots
        .map((s) => ({
            snapshot: s.id,
            used: propertyBytes(s.properties?.used),
            referenced: propertyBytes(s.properties?.referenced),
        }))
        .sort(bySizeThenName((s) => s.used, (s) => s.snapshot))
        .slice(0, top);

    return {
        datasets: rows,
        largest,
        totalSnapshots: poolSnapshots.length,
        totalUsedBySnapshots: rows.reduce((sum, row) => sum + row.usedBySnapshots, 0),
    };
}

/**
 * Snapshot space usage for the catalog's pool
 */
export async function snapshotUsage(
    client: TrueNasClient,
    catalog: Pick<Catalog, "pool">,
    top: number = DEFAULT_LARGEST_SNAPSHOTS
): Promise<SnapshotUsageReport> {
    const datasets = await client.datasets.list();
    const snapshots = await client.snapshots.list();
    return summarizeSnapshotUsage(datasets, snapshots, catalog.pool, top);
}
