/**
 * Tunable tooling
 *
 * Validation creates each tunable on a live system, checks that the
 * middleware kept it, then removes it again. Cleanup finds tunables left
 * behind by earlier validation runs.
 */

import { writeFile } from "node:fs/promises";
import type { TunableSpec, TunableType } from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";
import { JobTimeoutError } from "./errors.js";
import type { TrueNasTunable } from "./types.js";

/** How long to let the middleware settle after a tunable change */
export const TUNABLE_JOB_TIMEOUT_MS: Record<TunableType, number> = {
    ZFS: 30_000,
    SYSCTL: 15_000,
};

const REMOVE_SETTLE_MS = 10_000;

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export const DEFAULT_RESULTS_FILE = "tunable_validation_results.json";

const TEST_COMMENT_MARKERS = ["test", "validation", "performance tunable test"];

export interface TunableValidationHooks {
    /** Called before each tunable is tried (1-based index) */
    onStart?: (tunable: TunableSpec, index: number, total: number) => void;
    onResult?: (result: TunableCheck) => void;
    /** Called when a settle wait ran out; validation carries on */
    onWarning?: (message: string) => void;
}

export interface TunableCheck {
    tunable: TunableSpec;
    valid: boolean;
    /** Why the middleware rejected it */
    reason?: string;
    /** Set when the tunable could not be removed after the check */
    cleanupIssue?: string;
    /** Live kernel value after creation (SYSCTL only, when exposed) */
    liveValue?: string;
}

export interface TunableValidationReport {
    valid: TunableCheck[];
    invalid: TunableCheck[];
}

/**
 * Waits for queued middleware jobs; a timeout is only a warning here
 */
async function settle(
    client: TrueNasClient,
    timeoutMs: number,
    onWarning?: (message: string) => void
): Promise<void> {
    try {
        await client.jobs.waitForIdle(timeoutMs);
    } catch (err) {
        if (!(err instanceof JobTimeoutError)) throw err;
        onWarning?.(`${err.message}, continuing`);
    }
}

/**
 * Deletes a tunable and checks it is gone; disables it when the delete does not take
 */
export async function removeTunable(
    client: TrueNasClient,
    id: number
): Promise<{ removed: boolean; method: "deleted" | "disabled" | "failed"; message: string }> {
    let deleteProblem: string;
    try {
        await client.tunables.delete(id);
        await settle(client, REMOVE_SETTLE_MS);
        const remaining = await client.tunables.list();
        if (!remaining.some((t) => t.id === id)) {
            return { removed: true, method: "deleted", message: "Deleted successfully" };
        }
        deleteProblem = "still present after delete";
    } catch (err) {
        deleteProblem = errorMessage(err);
    }

    try {
        await client.tunables.update(id, { enabled: false });
        await settle(client, REMOVE_SETTLE_MS);
        return {
            removed: true,
            method: "disabled",
            message: `Disabled successfully (${deleteProblem})`,
        };
    } catch (err) {
        return {
            removed: false,
            method: "failed",
            message: `Failed to delete tunable ${id}: ${errorMessage(err)}`,
        };
    }
}

/**
 * Tries every tunable against the live system, one at a time
 */
export async function validateTunables(
    client: TrueNasClient,
    tunables: readonly TunableSpec[],
    hooks: TunableValidationHooks = {}
): Promise<TunableValidationReport> {
    const report: TunableValidationReport = { valid: [], invalid: [] };

    for (const [i, tunable] of tunables.entries()) {
        hooks.onStart?.(tunable, i + 1, tunables.length);
        const check = await validateOne(client, tunable, hooks);
        (check.valid ? report.valid : report.invalid).push(check);
        hooks.onResult?.(check);
    }
    return report;
}

async function validateOne(
    client: TrueNasClient,
    tunable: TunableSpec,
    hooks: TunableValidationHooks
): Promise<TunableCheck> {
    try {
        await client.tunables.create({
            var: tunable.var,
            value: tunable.value,
            type: tunable.type,
            comment: tunable.comment.slice(0, 255),
            enabled: true,
        });
    } catch (err) {
        return {
            tunable,
            valid: false,
            reason: `Create failed: ${errorMessage(err)}`,
        };
    }

    let check: TunableCheck;
    let createdId: number | undefined;
    try {
        await settle(client, TUNABLE_JOB_TIMEOUT_MS[tunable.type], hooks.onWarning);

        const created = (await client.tunables.list()).find((t) => t.var === tunable.var);
        if (!created) {
            return { tunable, valid: false, reason: "Not present after creation" };
        }
        createdId = created.id;

        check = { tunable, valid: true };
        if (tunable.type === "SYSCTL") {
            check.liveValue = await client.system.sysctl(tunable.var);
        }
    } catch (err) {
        check = { tunable, valid: false, reason: `Check failed: ${errorMessage(err)}` };
    }

    const cleanupIssue = await removeAfterCheck(client, tunable.var, createdId);
    if (cleanupIssue) {
        check.cleanupIssue = cleanupIssue;
    }
    return check;
}

/**
 * Removes the tunable a check created, looking it up by name when the
 * check failed before its id was known
 */
async function removeAfterCheck(
    client: TrueNasClient,
    name: string,
    id: number | undefined
): Promise<string | undefined> {
    let target = id;
    if (target === undefined) {
        try {
            target = (await client.tunables.list()).find((t) => t.var === name)?.id;
        } catch (err) {
            return `Could not look up ${name} for removal: ${errorMessage(err)}`;
        }
        if (target === undefined) return undefined;
    }
    const removal = await removeTunable(client, target);
    return removal.removed ? undefined : removal.message;
}

/**
 * Writes the validation results in the layout earlier runs used
 */
export async function writeValidationResults(
    report: TunableValidationReport,
    file: string = DEFAULT_RESULTS_FILE
): Promise<void> {
    const document = {
        total_tested: report.valid.length + report.invalid.length,
        valid_count: report.valid.length,
        invalid_count: report.invalid.length,
        valid_tunables: report.valid.map(({ tunable }) => ({
            name: tunable.var,
            type: tunable.type,
            value: tunable.value,
        })),
        invalid_tunables: report.invalid.map(({ tunable, reason }) => ({
            name: tunable.var,
            type: tunable.type,
            value: tunable.value,
            reason: reason ?? "",
        })),
    };
    await writeFile(file, JSON.stringify(document, null, 2) + "\n", "utf8");
}

/**
 * Tunables left behind by validation runs: a test marker in the comment,
 * or a variable the catalog manages
 */
export function findTestTunables(
    existing: readonly TrueNasTunable[],
    managedVars: Iterable<string>
): TrueNasTunable[] {
    const managed = new Set(managedVars);
    return existing.filter((t) => {
        const comment = (t.comment ?? "").toLowerCase();
        return TEST_COMMENT_MARKERS.some((marker) => comment.includes(marker)) || managed.has(t.var);
    });
}

export interface PurgeReport {
    deleted: TrueNasTunable[];
    failed: Array<{ tunable: TrueNasTunable; message: string }>;
}

/**
 * Removes the given tunables (every tunable on the system when omitted)
 */
export async function purgeTunables(
    client: TrueNasClient,
    targets?: readonly TrueNasTunable[],
    onProgress?: (tunable: TrueNasTunable, ok: boolean, message: string) => void
): Promise<PurgeReport> {
    const list = targets ?? (await client.tunables.list());
    const report: PurgeReport = { deleted: [], failed: [] };
    for (const tunable of list) {
        const result = await removeTunable(client, tunable.id);
        if (result.removed) {
            report.deleted.push(tunable);
        } else {
            report.failed.push({ tunable, message: result.message });
        }
        onProgress?.(tunable, result.removed, result.message);
    }
    return report;
}
