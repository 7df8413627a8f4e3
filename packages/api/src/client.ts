/**
 * TrueNAS SCALE REST client
 *
 * Thin wrapper around the middleware's /api/v2.0 endpoints. One request
 * helper converts every failure into a TrueNasApiError; the namespaces
 * below only shape URLs and payloads.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type Method } from "axios";
import * as https from "node:https";
import { setTimeout as sleep } from "node:timers/promises";
import { JobFailedError, JobTimeoutError, TrueNasApiError, toApiError } from "./errors.js";
import type {
    CreateDatasetPayload,
    CreateGroupPayload,
    CreateSnapshotPayload,
    CreateTunablePayload,
    CreateUserPayload,
    FileStat,
    SetPermissionsPayload,
    SnapshotTaskPayload,
    SystemInfo,
    TrueNasDataset,
    TrueNasGroup,
    TrueNasJob,
    TrueNasSnapshot,
    TrueNasSnapshotTask,
    TrueNasTunable,
    TrueNasUser,
    UpdateDatasetPayload,
    UpdateTunablePayload,
    UpdateUserPayload,
} from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 500;
/** setperm on a large tree can take a while */
export const DEFAULT_JOB_TIMEOUT_MS = 10 * 60_000;

export interface TrueNasClientOptions {
    /** Host name or address, optionally with a port */
    host: string;
    apiKey: string;
    scheme?: "http" | "https";
    /** Accept self-signed certificates */
    allowInsecureTls?: boolean;
    timeoutMs?: number;
    /** Delay between job status polls */
    pollIntervalMs?: number;
    /** Replaces the HTTP transport (tests plug an in-process middleware in here) */
    adapter?: AxiosRequestConfig["adapter"];
}

export class TrueNasClient {
    readonly baseUrl: string;
    private readonly http: AxiosInstance;
    private readonly pollIntervalMs: number;

    constructor(options: TrueNasClientOptions) {
        const scheme = options.scheme ?? "https";
        const host = options.host.replace(/^https?:\/\//, "").replace(/\/+$/, "");
        this.baseUrl = `${scheme}://${host}/api/v2.0`;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

        const httpsAgent =
            scheme === "https" && options.allowInsecureTls
                ? new https.Agent({ rejectUnauthorized: false })
                : undefined;

        this.http = axios.create({
            baseURL: this.baseUrl,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            httpsAgent,
            adapter: options.adapter,
            headers: {
                Authorization: `Bearer ${options.apiKey}`,
                Accept: "application/json",
                "Content-Type": "application/json",
            },
        });
    }

    /**
     * Sends one request and returns the response body
     */
    async request<T>(
        method: Method,
        path: string,
        data?: unknown,
        params?: Record<string, string | number | boolean>
    ): Promise<T> {
        const verb = method.toUpperCase();
        try {
            const response = await this.http.request<T>({ method, url: path, data, params });
            return response.data;
        } catch (err) {
            throw toApiError(err, verb, path);
        }
    }

    // ---- Groups ----

    readonly groups = {
        list: (): Promise<TrueNasGroup[]> => this.request("GET", "/group"),

        findByName: async (name: string): Promise<TrueNasGroup | undefined> => {
            const found = await this.request<TrueNasGroup[]>("GET", "/group", undefined, {
                group: name,
            });
            return found.find((group) => group.group === name);
        },

        /** Returns the internal id of the new group */
        create: (payload: CreateGroupPayload): Promise<number> =>
            this.request("POST", "/group", payload),
    };

    // ---- Users ----

    readonly users = {
        list: (): Promise<TrueNasUser[]> => this.request("GET", "/user"),

        findByName: async (username: string): Promise<TrueNasUser | undefined> => {
            const found = await this.request<TrueNasUser[]>("GET", "/user", undefined, {
                username,
            });
            return found.find((user) => user.username === username);
        },

        /** Returns the internal id of the new user */
        create: (payload: CreateUserPayload): Promise<number> =>
            this.request("POST", "/user", payload),

        update: (id: number, payload: UpdateUserPayload): Promise<number> =>
            this.request("PUT", `/user/id/${id}`, payload),
    };

    // ---- Datasets ----

    readonly datasets = {
        /** Returns undefined when the dataset does not exist */
        get: async (name: string): Promise<TrueNasDataset | undefined> => {
            try {
                return await this.request<TrueNasDataset>(
                    "GET",
                    `/pool/dataset/id/${encodeURIComponent(name)}`
                );
            } catch (err) {
                if (err instanceof TrueNasApiError && err.isNotFound) return undefined;
                throw err;
            }
        },

        list: (): Promise<TrueNasDataset[]> => this.request("GET", "/pool/dataset"),

        create: (payload: CreateDatasetPayload): Promise<TrueNasDataset> =>
            this.request("POST", "/pool/dataset", payload),

        update: (name: string, payload: UpdateDatasetPayload): Promise<TrueNasDataset> =>
            this.request("PUT", `/pool/dataset/id/${encodeURIComponent(name)}`, payload),
    };

    // ---- Periodic snapshot tasks ----

    readonly snapshotTasks = {
        list: (): Promise<TrueNasSnapshotTask[]> => this.request("GET", "/pool/snapshottask"),

        create: (payload: SnapshotTaskPayload): Promise<TrueNasSnapshotTask> =>
            this.request("POST", "/pool/snapshottask", payload),

        delete: (id: number): Promise<boolean> =>
            this.request("DELETE", `/pool/snapshottask/id/${id}`),
    };

    // ---- Snapshots ----

    readonly snapshots = {
        /** Lists snapshots, optionally only those of one dataset */
        list: (dataset?: string): Promise<TrueNasSnapshot[]> =>
            this.request(
                "GET",
                "/zfs/snapshot",
                undefined,
                dataset === undefined ? undefined : { dataset }
            ),

        create: (payload: CreateSnapshotPayload): Promise<TrueNasSnapshot> =>
            this.request("POST", "/zfs/snapshot", payload),

        delete: (id: string): Promise<boolean> =>
            this.request("DELETE", `/zfs/snapshot/id/${encodeURIComponent(id)}`),
    };

    // ---- Tunables ----

    readonly tunables = {
        list: (): Promise<TrueNasTunable[]> => this.request("GET", "/tunable"),

        /** Tunable changes run as middleware jobs; these return the job id */
        create: (payload: CreateTunablePayload): Promise<number> =>
            this.request("POST", "/tunable", payload),

        update: (id: number, payload: UpdateTunablePayload): Promise<number> =>
            this.request("PUT", `/tunable/id/${id}`, payload),

        delete: (id: number): Promise<number> => this.request("DELETE", `/tunable/id/${id}`),
    };

    // ---- Filesystem ----

    readonly filesystem = {
        /** Starts a setperm job and returns its id */
        setPermissions: (payload: SetPermissionsPayload): Promise<number> =>
            this.request("POST", "/filesystem/setperm", payload),

        // The endpoint takes a bare JSON string; axios would send a string body unquoted
        stat: (path: string): Promise<FileStat> =>
            this.request("POST", "/filesystem/stat", JSON.stringify(path)),
    };

    // ---- System ----

    readonly system = {
        info: (): Promise<SystemInfo> => this.request("GET", "/system/info"),

        /**
         * Live value of a kernel variable, or undefined when the middleware
         * does not expose sysctl values or does not know the variable
         */
        sysctl: async (name: string): Promise<string | undefined> => {
            let values: Record<string, string>;
            try {
                values = await this.request<Record<string, string>>(
                    "POST",
                    "/tunable/get_sysctl_variables"
                );
            } catch (err) {
                if (err instanceof TrueNasApiError && err.isNotFound) return undefined;
                throw err;
            }
            return values[name];
        },
    };

    // ---- Jobs ----

    private async getJob(id: number): Promise<TrueNasJob | undefined> {
        const found = await this.request<TrueNasJob[]>("GET", "/core/get_jobs", undefined, { id });
        return found.find((job) => job.id === id);
    }

    private listJobs(): Promise<TrueNasJob[]> {
        return this.request("GET", "/core/get_jobs");
    }

    readonly jobs = {
        get: (id: number): Promise<TrueNasJob | undefined> => this.getJob(id),

        list: (): Promise<TrueNasJob[]> => this.listJobs(),

        /**
         * Polls a job until it finishes and returns its result
         */
        waitFor: async (id: number, timeoutMs = DEFAULT_JOB_TIMEOUT_MS): Promise<unknown> => {
            const deadline = Date.now() + timeoutMs;
            for (;;) {
                const job = await this.getJob(id);
                if (!job) {
                    throw new JobFailedError(id, "MISSING", "job not found");
                }
                if (job.state === "SUCCESS") {
                    return job.result;
                }
                if (job.state === "FAILED" || job.state === "ABORTED") {
                    throw new JobFailedError(id, job.state, job.error ?? "no error message");
                }
                if (Date.now() >= deadline) {
                    throw new JobTimeoutError(timeoutMs, id);
                }
                await sleep(this.pollIntervalMs);
            }
        },

        /**
         * Polls until no job is RUNNING or WAITING
         */
        waitForIdle: async (timeoutMs = DEFAULT_JOB_TIMEOUT_MS): Promise<void> => {
            const deadline = Date.now() + timeoutMs;
            for (;;) {
                const jobs = await this.listJobs();
                const busy = jobs.some((job) => job.state === "RUNNING" || job.state === "WAITING");
                if (!busy) return;
                if (Date.now() >= deadline) {
                    throw new JobTimeoutError(timeoutMs);
                }
                await sleep(this.pollIntervalMs);
            }
        },
    };
}
