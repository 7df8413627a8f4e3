/**
 * In-process stand-in for the TrueNAS middleware REST API
 *
 * Plugged into TrueNasClient as an axios adapter, so tests exercise the
 * real request path without a network. State is plain arrays the tests
 * can seed and inspect.
 */

import {
    AxiosError,
    AxiosHeaders,
    type AxiosResponse,
    type InternalAxiosRequestConfig,
} from "axios";
import { TrueNasClient } from "../../src/client.js";
import type {
    TrueNasDataset,
    TrueNasGroup,
    TrueNasJob,
    TrueNasSnapshot,
    TrueNasSnapshotTask,
    TrueNasTunable,
    TrueNasUser,
    FileStat,
    JobState,
    ZfsProperty,
} from "../../src/types.js";

export interface RecordedCall {
    method: string;
    path: string;
    body: unknown;
    params: Record<string, unknown>;
}

interface ScriptedFailure {
    method: string;
    path: string | RegExp;
    status: number;
    message: string;
    times: number;
}

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(body: Json, key: string): string {
    const value = body[key];
    return typeof value === "string" ? value : "";
}

function num(body: Json, key: string): number {
    const value = body[key];
    return typeof value === "number" ? value : 0;
}

function bool(body: Json, key: string): boolean {
    return body[key] === true;
}

function numbers(body: Json, key: string): number[] {
    const value = body[key];
    return Array.isArray(value) ? value.filter((v): v is number => typeof v === "number") : [];
}

function strings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function bytes(count: number): ZfsProperty {
    return { value: String(count), rawvalue: String(count), source: "NONE" };
}

class HttpError extends Error {
    constructor(
        public readonly status: number,
        message: string
    ) {
        super(message);
    }
}

export class FakeTrueNas {
    groups: TrueNasGroup[] = [];
    users: TrueNasUser[] = [];
    datasets: TrueNasDataset[] = [];
    snapshotTasks: TrueNasSnapshotTask[] = [];
    snapshots: TrueNasSnapshot[] = [];
    tunables: TrueNasTunable[] = [];
    jobs: TrueNasJob[] = [];
    /** path -> stat; dataset mountpoints are added automatically */
    files = new Map<string, FileStat>();
    sysctl: Record<string, string> | undefined = {};
    calls: RecordedCall[] = [];
    /** State new jobs start in; SUCCESS finishes them immediately */
    jobState: JobState = "SUCCESS";
    /** Tunable deletes are accepted but leave the tunable in place */
    stickyTunables = false;

    private nextId = 1;
    private failures: ScriptedFailure[] = [];

    constructor(readonly pool = "tank") {
        this.addDataset(pool);
    }

    /**
     * Makes the next matching request(s) fail with the given status
     */
    failOn(method: string, path: string | RegExp, status: number, message: string, times = 1): void {
        this.failures.push({ method: method.toUpperCase(), path, status, message, times });
    }

    client(overrides: { pollIntervalMs?: number } = {}): TrueNasClient {
        return new TrueNasClient({
            host: "nas.test",
            apiKey: "test-secret",
            scheme: "http",
            pollIntervalMs: overrides.pollIntervalMs ?? 0,
            adapter: (config) => this.handle(config),
        });
    }

    callsTo(method: string, path: string | RegExp): RecordedCall[] {
        return this.calls.filter(
            (c) =>
                c.method === method.toUpperCase() &&
                (typeof path === "string" ? c.path === path : path.test(c.path))
        );
    }

    // ---- seeding helpers ----

    addGroup(name: string, gid: number): TrueNasGroup {
        const group: TrueNasGroup = { id: this.nextId++, gid, group: name, builtin: false, smb: false };
        this.groups.push(group);
        return group;
    }

    addUser(username: string, uid: number, groupName: string, home: string, extra: number[] = []): TrueNasUser {
        const group = this.groups.find((g) => g.group === groupName);
        if (!group) throw new Error(`seed group ${groupName} first`);
        const user: TrueNasUser = {
            id: this.nextId++,
            uid,
            username,
            full_name: username,
            home,
            shell: "/usr/sbin/nologin",
            builtin: false,
            group: { id: group.id, bsdgrp_gid: group.gid, bsdgrp_group: group.group },
            groups: [...extra],
        };
        this.users.push(user);
        return user;
    }

    addDataset(
        name: string,
        props: {
            recordsize?: string;
            compression?: string;
            atime?: string;
            used?: number;
            usedbysnapshots?: number;
        } = {}
    ): TrueNasDataset {
        const dataset: TrueNasDataset = {
            id: name,
            name,
            type: "FILESYSTEM",
            mountpoint: `/mnt/${name}`,
            recordsize: { value: props.recordsize ?? "128K" },
            compression: { value: props.compression ?? "LZ4" },
            atime: { value: props.atime ?? "OFF" },
            xattr: { value: "SA" },
        };
        if (props.used !== undefined) dataset.used = bytes(props.used);
        if (props.usedbysnapshots !== undefined) dataset.usedbysnapshots = bytes(props.usedbysnapshots);
        this.datasets.push(dataset);
        this.files.set(`/mnt/${name}`, { mode: 0o40755, uid: 0, gid: 0 });
        return dataset;
    }

    addTunable(varName: string, value: string, type = "SYSCTL", comment = "", enabled = true): TrueNasTunable {
        const tunable: TrueNasTunable = { id: this.nextId++, var: varName, value, type, comment, enabled };
        this.tunables.push(tunable);
        return tunable;
    }

    addSnapshot(id: string, sizes: { used?: number; referenced?: number } = {}): TrueNasSnapshot {
        const [dataset, name] = id.split("@");
        const snapshot: TrueNasSnapshot = { id, name: id, dataset, snapshot_name: name };
        if (sizes.used !== undefined || sizes.referenced !== undefined) {
            snapshot.properties = {
                used: bytes(sizes.used ?? 0),
                referenced: bytes(sizes.referenced ?? 0),
            };
        }
        this.snapshots.push(snapshot);
        return snapshot;
    }

    addJob(method: string, state: JobState, error?: string): TrueNasJob {
        const job: TrueNasJob = { id: this.nextId++, method, state, result: null, error: error ?? null };
        this.jobs.push(job);
        return job;
    }

    // ---- request handling ----

    private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
        const method = (config.method ?? "get").toUpperCase();
        const path = config.url ?? "";
        const params: Record<string, unknown> = isJson(config.params) ? config.params : {};
        const body: unknown = typeof config.data === "string" ? JSON.parse(config.data) : config.data;
        this.calls.push({ method, path, body, params });

        const respond = (status: number, data: unknown): AxiosResponse => ({
            data,
            status,
            statusText: String(status),
            headers: new AxiosHeaders(),
            config,
        });

        const failure = this.failures.find(
            (f) =>
                f.times > 0 &&
                f.method === method &&
                (typeof f.path === "string" ? f.path === path : f.path.test(path))
        );
        try {
            if (failure) {
                failure.times -= 1;
                throw new HttpError(failure.status, failure.message);
            }
            // Clone so callers never hold references into the fake's state
            return respond(200, structuredClone(this.route(method, path, body, params)));
        } catch (err) {
            if (!(err instanceof HttpError)) throw err;
            const response = respond(err.status, { message: err.message });
            throw new AxiosError(
                `Request failed with status code ${err.status}`,
                err.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
                config,
                undefined,
                response
            );
        }
    }

    private startJob(method: string, error?: string): number {
        const job = this.addJob(method, error ? "FAILED" : this.jobState, error);
        return job.id;
    }

    private route(method: string, path: string, body: unknown, params: Record<string, unknown>): unknown {
        const data: Json = isJson(body) ? body : {};
        const idMatch = /\/id\/(.+)$/.exec(path);
        const rawId = idMatch ? decodeURIComponent(idMatch[1]) : "";
        const numericId = Number(rawId);

        // groups
        if (path === "/group" && method === "GET") {
            return params.group === undefined
                ? this.groups
                : this.groups.filter((g) => g.group === params.group);
        }
        if (path === "/group" && method === "POST") {
            const name = str(data, "name");
            if (this.groups.some((g) => g.group === name)) {
                throw new HttpError(422, `group_create.name: A Group with the name "${name}" already exists.`);
            }
            return this.addGroup(name, num(data, "gid")).id;
        }

        // users
        if (path === "/user" && method === "GET") {
            return params.username === undefined
                ? this.users
                : this.users.filter((u) => u.username === params.username);
        }
        if (path === "/user" && method === "POST") {
            const group = this.groups.find((g) => g.id === num(data, "group"));
            if (!group) throw new HttpError(422, "user_create.group: group not found");
            const user = this.addUser(str(data, "username"), num(data, "uid"), group.group, str(data, "home"), numbers(data, "groups"));
            user.full_name = str(data, "full_name");
            user.shell = str(data, "shell");
            return user.id;
        }
        if (path.startsWith("/user/id/") && method === "PUT") {
            const user = this.users.find((u) => u.id === numericId);
            if (!user) throw new HttpError(404, "user not found");
            if (data.groups !== undefined) user.groups = numbers(data, "groups");
            return user.id;
        }

        // datasets
        if (path === "/pool/dataset" && method === "GET") return this.datasets;
        if (path.startsWith("/pool/dataset/id/")) {
            const dataset = this.datasets.find((d) => d.id === rawId);
            if (!dataset) throw new HttpError(404, `${rawId} not found`);
            if (method === "GET") return dataset;
            if (method === "PUT") {
                if (data.recordsize !== undefined) dataset.recordsize = { value: str(data, "recordsize") };
                if (data.compression !== undefined) dataset.compression = { value: str(data, "compression") };
                if (data.atime !== undefined) dataset.atime = { value: str(data, "atime") };
                return dataset;
            }
        }
        if (path === "/pool/dataset" && method === "POST") {
            const name = str(data, "name");
            const parent = name.slice(0, name.lastIndexOf("/"));
            if (!this.datasets.some((d) => d.id === parent)) {
                throw new HttpError(422, `pool_dataset_create.name: Parent dataset ${parent} does not exist`);
            }
            if (this.datasets.some((d) => d.id === name)) {
                throw new HttpError(409, `${name} already exists`);
            }
            return this.addDataset(name, {
                recordsize: str(data, "recordsize"),
                compression: str(data, "compression"),
                atime: str(data, "atime"),
            });
        }

        // periodic snapshot tasks
        if (path === "/pool/snapshottask" && method === "GET") return this.snapshotTasks;
        if (path === "/pool/snapshottask" && method === "POST") {
            const schedule = isJson(data.schedule) ? data.schedule : {};
            const task: TrueNasSnapshotTask = {
                id: this.nextId++,
                dataset: str(data, "dataset"),
                recursive: bool(data, "recursive"),
                exclude: strings(data.exclude),
                lifetime_value: num(data, "lifetime_value"),
                lifetime_unit: str(data, "lifetime_unit"),
                naming_schema: str(data, "naming_schema"),
                schedule: {
                    minute: str(schedule, "minute"),
                    hour: str(schedule, "hour"),
                    dom: str(schedule, "dom"),
                    month: str(schedule, "month"),
                    dow: str(schedule, "dow"),
                },
                allow_empty: bool(data, "allow_empty"),
                enabled: bool(data, "enabled"),
            };
            this.snapshotTasks.push(task);
            return task;
        }
        if (path.startsWith("/pool/snapshottask/id/") && method === "DELETE") {
            this.snapshotTasks = this.snapshotTasks.filter((t) => t.id !== numericId);
            return true;
        }

        // snapshots
        if (path === "/zfs/snapshot" && method === "GET") {
            return params.dataset === undefined
                ? this.snapshots
                : this.snapshots.filter((s) => s.dataset === params.dataset);
        }
        if (path === "/zfs/snapshot" && method === "POST") {
            return this.addSnapshot(`${str(data, "dataset")}@${str(data, "name")}`);
        }
        if (path.startsWith("/zfs/snapshot/id/") && method === "DELETE") {
            if (!this.snapshots.some((s) => s.id === rawId)) throw new HttpError(404, `${rawId} not found`);
            this.snapshots = this.snapshots.filter((s) => s.id !== rawId);
            return true;
        }

        // tunables
        if (path === "/tunable" && method === "GET") return this.tunables;
        if (path === "/tunable" && method === "POST") {
            const varName = str(data, "var");
            if (this.tunables.some((t) => t.var === varName)) {
                throw new HttpError(422, `tunable_create.var: This variable already exists`);
            }
            this.addTunable(varName, str(data, "value"), str(data, "type"), str(data, "comment"), bool(data, "enabled"));
            return this.startJob("tunable.create");
        }
        if (path === "/tunable/get_sysctl_variables" && method === "POST") {
            if (this.sysctl === undefined) throw new HttpError(404, "Not Found");
            return this.sysctl;
        }
        if (path.startsWith("/tunable/id/")) {
            const tunable = this.tunables.find((t) => t.id === numericId);
            if (!tunable) throw new HttpError(404, `tunable ${numericId} not found`);
            if (method === "PUT") {
                if (data.value !== undefined) tunable.value = str(data, "value");
                if (data.enabled !== undefined) tunable.enabled = bool(data, "enabled");
                return this.startJob("tunable.update");
            }
            if (method === "DELETE") {
                if (!this.stickyTunables) {
                    this.tunables = this.tunables.filter((t) => t.id !== numericId);
                }
                return this.startJob("tunable.delete");
            }
        }

        // filesystem
        if (path === "/filesystem/stat" && method === "POST") {
            const target = typeof body === "string" ? body : "";
            const stat = this.files.get(target);
            if (!stat) throw new HttpError(422, `[ENOENT] Path ${target} not found`);
            return stat;
        }
        if (path === "/filesystem/setperm" && method === "POST") {
            const target = str(data, "path");
            if (!this.files.has(target)) {
                return this.startJob("filesystem.setperm", `[ENOENT] Path ${target} not found`);
            }
            this.files.set(target, {
                mode: 0o40000 | parseInt(str(data, "mode"), 8),
                uid: num(data, "uid"),
                gid: num(data, "gid"),
            });
            return this.startJob("filesystem.setperm");
        }

        // jobs and system
        if (path === "/core/get_jobs" && method === "GET") {
            return params.id === undefined ? this.jobs : this.jobs.filter((j) => j.id === params.id);
        }
        if (path === "/system/info" && method === "GET") {
            return { version: "TrueNAS-SCALE-24.04.2", hostname: "nas", uptime_seconds: 3600 };
        }

        throw new HttpError(404, `No route for ${method} ${path}`);
    }
}
