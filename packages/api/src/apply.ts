/**
 * Catalog apply over the REST API
 *
 * Runs the selected stages in apply order. Every stage walks its catalog
 * rows, looks the row up on the NAS, creates it when absent and converges
 * its properties otherwise. Each row ends with one outcome.
 */

import {
    APPLY_STAGES,
    logInfo,
    logSection,
    logWarn,
    poolPath,
    type ApplyStage,
    type Catalog,
    type PermissionSpec,
} from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";
import { TrueNasApiError } from "./errors.js";
import {
    NOLOGIN_SHELL,
    datasetDifferences,
    datasetPayload,
    indexBy,
    modeString,
    sameMode,
    snapshotTaskDifferences,
    snapshotTaskPayload,
} from "./payloads.js";
import type { FileStat, TrueNasGroup } from "./types.js";

export type ApplyOutcome = "created" | "updated" | "unchanged" | "skipped" | "failed";

export interface ApplyResult {
    stage: ApplyStage;
    /** Row identifier: group, user, dataset, path, naming schema or tunable name */
    key: string;
    outcome: ApplyOutcome;
    detail?: string;
}

export interface ApplyOptions {
    /** Stages to run; always executed in apply order (default: all) */
    stages?: readonly ApplyStage[];
    /** Only read, and report what would change as "skipped" */
    dryRun?: boolean;
    /** Record a failure and move on to the next row instead of stopping */
    keepGoing?: boolean;
    /** Timeout for each middleware job (setperm, tunables) */
    jobTimeoutMs?: number;
    /** Called after each row; the CLI uses it for progress lines */
    onResult?: (result: ApplyResult) => void;
}

export interface ApplyReport {
    stages: ApplyStage[];
    results: ApplyResult[];
    /** True when a failure stopped the run early */
    aborted: boolean;
    dryRun: boolean;
}

type RowOutcome = { outcome: Exclude<ApplyOutcome, "failed">; detail?: string };

class ApplyAborted extends Error {
    constructor(public readonly result: ApplyResult) {
        super(`${result.stage} ${result.key}: ${result.detail ?? "failed"}`);
        this.name = "ApplyAborted";
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Counts of each outcome, per stage
 */
export function summarizeResults(
    results: readonly ApplyResult[]
): Map<ApplyStage, Record<ApplyOutcome, number>> {
    const summary = new Map<ApplyStage, Record<ApplyOutcome, number>>();
    for (const result of results) {
        let counts = summary.get(result.stage);
        if (!counts) {
            counts = { created: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };
            summary.set(result.stage, counts);
        }
        counts[result.outcome] += 1;
    }
    return summary;
}

class ApplyRun {
    readonly results: ApplyResult[] = [];
    private groupIds = new Map<string, TrueNasGroup>();
    private readonly userIds = new Map<string, number>();

    constructor(
        private readonly client: TrueNasClient,
        private readonly catalog: Catalog,
        private readonly options: ApplyOptions
    ) {}

    private get dryRun(): boolean {
        return this.options.dryRun === true;
    }

    private get jobTimeoutMs(): number | undefined {
        return this.options.jobTimeoutMs;
    }

    private record(result: ApplyResult): void {
        this.results.push(result);
        this.options.onResult?.(result);
    }

    /**
     * Runs one row; a 409 from a create counts as unchanged
     */
    private async row(stage: ApplyStage, key: string, fn: () => Promise<RowOutcome>): Promise<void> {
        try {
            const { outcome, detail } = await fn();
            this.record({ stage, key, outcome, detail });
        } catch (err) {
            if (err instanceof TrueNasApiError && err.isConflict) {
                this.record({ stage, key, outcome: "unchanged", detail: "already exists" });
                return;
            }
            const result: ApplyResult = { stage, key, outcome: "failed", detail: errorMessage(err) };
            this.record(result);
            if (!this.options.keepGoing && stage !== "permissions") {
                throw new ApplyAborted(result);
            }
        }
    }

    async run(stage: ApplyStage): Promise<void> {
        switch (stage) {
            case "groups":
                return this.applyGroups();
            case "datasets":
                return this.applyDatasets();
            case "users":
                return this.applyUsers();
            case "permissions":
                return this.applyPermissions();
            case "snapshots":
                return this.applySnapshotTasks();
            case "tunables":
                return this.applyTunables();
        }
    }

    // ---- groups ----

    private async applyGroups(): Promise<void> {
        logSection("Creating Service Groups");
        const live = indexBy(await this.client.groups.list(), (g) => g.group);

        for (const group of this.catalog.groups) {
            await this.row("groups", group.name, async () => {
                const existing = live.get(group.name);
                if (existing) {
                    return existing.gid === group.gid
                        ? { outcome: "unchanged" }
                        : { outcome: "unchanged", detail: `exists with gid ${existing.gid}` };
                }
                if (this.dryRun) {
                    return { outcome: "skipped", detail: `would create gid ${group.gid}` };
                }
                await this.client.groups.create({ name: group.name, gid: group.gid, smb: false });
                logInfo(`Created group: ${group.name} (${group.gid})`);
                return { outcome: "created" };
            });
        }
    }

    // ---- datasets ----

    private async applyDatasets(): Promise<void> {
        logSection("Creating ZFS Datasets");
        for (const dataset of this.catalog.datasets) {
            const payload = datasetPayload(this.catalog, dataset);
            await this.row("datasets", payload.name, async () => {
                const live = await this.client.datasets.get(payload.name);
                if (!live) {
                    if (this.dryRun) return { outcome: "skipped", detail: "would create" };
                    await this.client.datasets.create(payload);
                    logInfo(`Created dataset: ${payload.name} (recordsize=${dataset.recordsize})`);
                    return { outcome: "created" };
                }

                const diffs = datasetDifferences(dataset, live);
                if (diffs.length === 0) return { outcome: "unchanged" };

                const detail = diffs.map((d) => `${d.field} ${d.actual} -> ${d.expected}`).join(", ");
                if (this.dryRun) return { outcome: "skipped", detail: `would set ${detail}` };
                await this.client.datasets.update(payload.name, {
                    recordsize: payload.recordsize,
                    compression: payload.compression,
                    atime: payload.atime,
                });
                logInfo(`Updated dataset: ${payload.name} (${detail})`);
                return { outcome: "updated", detail };
            });
        }
    }

    // ---- users ----

    private async loadGroupIds(): Promise<void> {
        this.groupIds = indexBy(await this.client.groups.list(), (g) => g.group);
    }

    private groupId(name: string): number {
        const group = this.groupIds.get(name);
        if (!group) {
            throw new Error(`group '${name}' does not exist on the NAS`);
        }
        return group.id;
    }

    private async applyUsers(): Promise<void> {
        logSection("Creating Service Users");
        await this.loadGroupIds();
        const live = indexBy(await this.client.users.list(), (u) => u.username);

        for (const service of this.catalog.services) {
            await this.row("users", service.name, async () => {
                const extraGroups = this.catalog.memberships
                    .filter((m) => m.user === service.name)
                    .map((m) => m.group);
                const existing = live.get(service.name);

                if (!existing) {
                    if (this.dryRun && !this.groupIds.has(service.group)) {
                        return { outcome: "skipped", detail: `would create (group ${service.group} pending)` };
                    }
                    const primary = this.groupId(service.group);
                    const supplementary = extraGroups.map((g) => this.groupId(g));
                    if (this.dryRun) return { outcome: "skipped", detail: `would create uid ${service.uid}` };
                    await this.client.users.create({
                        username: service.name,
                        uid: service.uid,
                        group: primary,
                        group_create: false,
                        groups: supplementary,
                        home: service.home,
                        home_create: false,
                        full_name: service.description,
                        shell: NOLOGIN_SHELL,
                        password_disabled: true,
                        smb: false,
                    });
                    logInfo(`Created user: ${service.name} (${service.uid}) in group ${service.group}`);
                    return { outcome: "created" };
                }

                const missing = extraGroups.filter((g) => {
                    const group = this.groupIds.get(g);
                    return !group || !existing.groups.includes(group.id);
                });
                if (missing.length === 0) return { outcome: "unchanged" };

                const detail = `add to ${missing.join(", ")}`;
                if (this.dryRun) return { outcome: "skipped", detail: `would ${detail}` };
                const merged = [...existing.groups, ...missing.map((g) => this.groupId(g))];
                await this.client.users.update(existing.id, { groups: merged });
                logInfo(`Added ${service.name} to ${missing.join(", ")}`);
                return { outcome: "updated", detail };
            });
        }
    }

    // ---- permissions ----

    private async ownerUid(name: string): Promise<number> {
        if (name === "root") return 0;
        const service = this.catalog.services.find((s) => s.name === name);
        if (service) return service.uid;
        const cached = this.userIds.get(name);
        if (cached !== undefined) return cached;
        const user = await this.client.users.findByName(name);
        if (!user) throw new Error(`user '${name}' does not exist`);
        this.userIds.set(name, user.uid);
        return user.uid;
    }

    private ownerGid(name: string): number {
        if (name === "root") return 0;
        const group = this.catalog.groups.find((g) => g.name === name);
        if (!group) throw new Error(`group '${name}' is not in the catalog`);
        return group.gid;
    }

    private async statPath(path: string): Promise<FileStat | undefined> {
        try {
            return await this.client.filesystem.stat(path);
        } catch (err) {
            if (err instanceof TrueNasApiError && err.isMissingPath) return undefined;
            throw err;
        }
    }

    private isCatalogDataset(path: string): boolean {
        return this.catalog.datasets.some((dataset) => dataset.name === path);
    }

    private async applyPermission(permission: PermissionSpec): Promise<RowOutcome> {
        const path = poolPath(this.catalog, permission.path);
        const stat = await this.statPath(path);
        if (!stat) {
            // A dry run never creates the datasets these paths live on
            if (this.dryRun && this.isCatalogDataset(permission.path)) {
                return { outcome: "skipped", detail: "would set after dataset creation" };
            }
            throw new Error(`path not found: ${path}`);
        }

        const uid = await this.ownerUid(permission.owner);
        const gid = this.ownerGid(permission.group);
        if (sameMode(permission.mode, stat.mode) && stat.uid === uid && stat.gid === gid) {
            return { outcome: "unchanged" };
        }

        const detail = `${stat.uid}:${stat.gid} ${modeString(stat.mode)} -> ${permission.owner}:${permission.group} ${permission.mode}`;
        if (this.dryRun) return { outcome: "skipped", detail: `would set ${detail}` };

        const jobId = await this.client.filesystem.setPermissions({
            path,
            mode: permission.mode,
            uid,
            gid,
            options: { recursive: permission.recursive },
        });
        await this.client.jobs.waitFor(jobId, this.jobTimeoutMs);
        logInfo(`Set ${permission.owner}:${permission.group} ${permission.mode} on ${path}`);
        return { outcome: "updated", detail };
    }

    private async applyPermissions(): Promise<void> {
        logSection("Setting Permissions");
        for (const permission of this.catalog.permissions) {
            await this.row("permissions", permission.path, () => this.applyPermission(permission));
        }
        if (this.catalog.acls.length > 0) {
            logWarn(
                `${this.catalog.acls.length} cross-group ACL grant(s) are applied by the host program only (setfacl)`
            );
        }
    }

    // ---- snapshot tasks ----

    private async applySnapshotTasks(): Promise<void> {
        logSection("Configuring Snapshot Tasks");
        const live = await this.client.snapshotTasks.list();

        for (const task of this.catalog.snapshotTasks) {
            const payload = snapshotTaskPayload(this.catalog, task);
            await this.row("snapshots", payload.naming_schema, async () => {
                const existing = live.find(
                    (t) => t.dataset === payload.dataset && t.naming_schema === payload.naming_schema
                );
                if (!existing) {
                    if (this.dryRun) return { outcome: "skipped", detail: `would create on ${payload.dataset}` };
                    await this.client.snapshotTasks.create(payload);
                    logInfo(`Created snapshot task: ${task.name} on ${payload.dataset}`);
                    return { outcome: "created" };
                }

                const diffs = snapshotTaskDifferences(payload, existing);
                if (diffs.length === 0) return { outcome: "unchanged" };

                const detail = diffs.map((d) => `${d.field} ${d.actual} -> ${d.expected}`).join(", ");
                if (this.dryRun) return { outcome: "skipped", detail: `would replace (${detail})` };
                await this.client.snapshotTasks.delete(existing.id);
                await this.client.snapshotTasks.create(payload);
                logInfo(`Replaced snapshot task: ${task.name} (${detail})`);
                return { outcome: "updated", detail };
            });
        }
    }

    // ---- tunables ----

    private async applyTunables(): Promise<void> {
        logSection("Applying Tunables");
        const live = indexBy(await this.client.tunables.list(), (t) => t.var);

        for (const tunable of this.catalog.tunables) {
            await this.row("tunables", tunable.var, async () => {
                const existing = live.get(tunable.var);
                if (!existing) {
                    if (this.dryRun) return { outcome: "skipped", detail: `would set ${tunable.value}` };
                    const jobId = await this.client.tunables.create({
                        var: tunable.var,
                        value: tunable.value,
                        type: tunable.type,
                        comment: tunable.comment.slice(0, 255),
                        enabled: true,
                    });
                    await this.client.jobs.waitFor(jobId, this.jobTimeoutMs);
                    logInfo(`Created ${tunable.type} tunable: ${tunable.var}=${tunable.value}`);
                    return { outcome: "created" };
                }

                if (existing.value === tunable.value && existing.enabled) {
                    return { outcome: "unchanged" };
                }
                const detail = `${existing.value} -> ${tunable.value}${existing.enabled ? "" : " (enable)"}`;
                if (this.dryRun) return { outcome: "skipped", detail: `would set ${detail}` };
                const jobId = await this.client.tunables.update(existing.id, {
                    value: tunable.value,
                    enabled: true,
                });
                await this.client.jobs.waitFor(jobId, this.jobTimeoutMs);
                logInfo(`Updated tunable: ${tunable.var} (${detail})`);
                return { outcome: "updated", detail };
            });
        }
    }
}

/**
 * Applies a catalog to a TrueNAS system through its REST API
 */
export async function applyCatalog(
    client: TrueNasClient,
    catalog: Catalog,
    options: ApplyOptions = {}
): Promise<ApplyReport> {
    const wanted = options.stages ?? APPLY_STAGES;
    const stages = APPLY_STAGES.filter((stage) => wanted.includes(stage));
    const run = new ApplyRun(client, catalog, options);
    let aborted = false;

    try {
        for (const stage of stages) {
            await run.run(stage);
        }
    } catch (err) {
        if (!(err instanceof ApplyAborted)) throw err;
        aborted = true;
    }

    return { stages, results: run.results, aborted, dryRun: options.dryRun === true };
}
