/**
 * Errors raised by the TrueNAS client
 */

import axios from "axios";

/**
 * A request the middleware rejected, or one that never got an answer (status 0)
 */
export class TrueNasApiError extends Error {
    constructor(
        public readonly status: number,
        public readonly method: string,
        public readonly path: string,
        public readonly detail: string
    ) {
        super(
            status === 0
                ? `${method} ${path} failed: ${detail}`
                : `${method} ${path} returned HTTP ${status}: ${detail}`
        );
        this.name = "TrueNasApiError";
    }

    get isConflict(): boolean {
        return this.status === 409;
    }

    get isNotFound(): boolean {
        return this.status === 404;
    }

    /** filesystem calls answer a missing path with 422 and an [ENOENT] detail */
    get isMissingPath(): boolean {
        return this.isNotFound || (this.status === 422 && this.detail.includes("ENOENT"));
    }
}

/**
 * A middleware job that ended FAILED or ABORTED
 */
export class JobFailedError extends Error {
    constructor(
        public readonly jobId: number,
        public readonly state: string,
        public readonly reason: string
    ) {
        super(`Job ${jobId} ${state.toLowerCase()}: ${reason}`);
        this.name = "JobFailedError";
    }
}

/**
 * A wait for one job, or for the job queue to drain, ran out of time
 */
export class JobTimeoutError extends Error {
    constructor(
        public readonly timeoutMs: number,
        public readonly jobId?: number
    ) {
        super(
            jobId === undefined
                ? `Middleware jobs still running after ${timeoutMs}ms`
                : `Job ${jobId} did not finish within ${timeoutMs}ms`
        );
        this.name = "JobTimeoutError";
    }
}

function describeBody(data: unknown): string | undefined {
    if (typeof data === "string" && data.trim() !== "") return data.trim();
    if (typeof data === "object" && data !== null) {
        if ("message" in data && typeof data.message === "string") return data.message;
        if ("detail" in data && typeof data.detail === "string") return data.detail;
        return JSON.stringify(data);
    }
    return undefined;
}

/**
 * Converts whatever axios threw into a TrueNasApiError
 */
export function toApiError(err: unknown, method: string, path: string): TrueNasApiError {
    if (err instanceof TrueNasApiError) return err;
    if (axios.isAxiosError(err)) {
        if (err.response) {
            const detail = describeBody(err.response.data) ?? err.response.statusText;
            return new TrueNasApiError(err.response.status, method, path, detail);
        }
        return new TrueNasApiError(0, method, path, err.code ? `${err.code} ${err.message}` : err.message);
    }
    return new TrueNasApiError(0, method, path, err instanceof Error ? err.message : String(err));
}
