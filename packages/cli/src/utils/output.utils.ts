/**
 * Console formatting for command results
 */

import { logSection, type ApplyStage } from "@tankctl/shared";
import {
    summarizeResults,
    type ApplyOutcome,
    type ApplyReport,
    type AccessCheck,
    type ApplyResult,
    type DriftEntry,
    type DriftReport,
    type ServiceStatus,
    type StatusReport,
} from "@tankctl/api";

export const STAGE_TITLES: Record<ApplyStage, string> = {
    groups: "Groups",
    datasets: "Datasets",
    users: "Users",
    permissions: "Permissions",
    snapshots: "Snapshot Tasks",
    tunables: "Tunables",
};

const OUTCOME_MARKS: Record<ApplyOutcome, string> = {
    created: "+",
    updated: "~",
    unchanged: "=",
    skipped: "-",
    failed: "✗",
};

const OUTCOMES: readonly ApplyOutcome[] = ["created", "updated", "unchanged", "skipped", "failed"];

export function formatResult(result: ApplyResult): string {
    const detail = result.detail ? ` (${result.detail})` : "";
    return `  ${OUTCOME_MARKS[result.outcome]} ${result.key}${detail}`;
}

export function formatStageSummary(stage: ApplyStage, counts: Record<ApplyOutcome, number>): string {
    const parts = OUTCOMES.map((outcome) => `${outcome} ${counts[outcome]}`);
    return `  ${stage.padEnd(12)}${parts.join(", ")}`;
}

export function printApplySummary(report: ApplyReport): void {
    const summary = summarizeResults(report.results);
    logSection(report.dryRun ? "Summary (dry run)" : "Summary");
    for (const stage of report.stages) {
        const counts = summary.get(stage);
        if (counts) {
            console.log(formatStageSummary(stage, counts));
        } else {
            console.log(`  ${stage.padEnd(12)}not run`);
        }
    }
}

export function formatDriftEntry(entry: DriftEntry): string {
    if (entry.field === undefined) {
        return `  ${entry.kind} ${entry.name}`;
    }
    return `  ${entry.kind} ${entry.name}: ${entry.field} expected ${entry.expected ?? ""}, found ${entry.actual ?? ""}`;
}

export function printDriftReport(report: DriftReport): void {
    logSection("Drift");
    if (report.clean) {
        console.log("No drift: the NAS matches the catalog");
        return;
    }
    if (report.missing.length > 0) {
        console.log(`Missing (${report.missing.length}):`);
        report.missing.forEach((entry) => console.log(formatDriftEntry(entry)));
    }
    if (report.mismatch.length > 0) {
        console.log(`Mismatched (${report.mismatch.length}):`);
        report.mismatch.forEach((entry) => console.log(formatDriftEntry(entry)));
    }
}

const SIZE_UNITS = ["B", "K", "M", "G", "T", "P"] as const;

/**
 * Byte count in the short binary units zfs list prints, e.g. "1.5G"
 */
export function formatBytes(bytes: number): string {
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
        value /= 1024;
        unit += 1;
    }
    return unit === 0 ? `${value}B` : `${value.toFixed(1)}${SIZE_UNITS[unit]}`;
}

export function formatServiceStatus(status: ServiceStatus): string {
    const mark = status.problems.length === 0 ? "✓" : "✗";
    const size = status.usedBytes === undefined ? "" : ` ${formatBytes(status.usedBytes)}`;
    const problems = status.problems.length === 0 ? "" : ` ${status.problems.join("; ")}`;
    return `  ${mark} ${status.service} [${status.category}]${size}${problems}`;
}

export function formatAccessCheck(check: AccessCheck): string {
    if (check.allowed) {
        return `  ✓ ${check.user} can ${check.access} ${check.path} (via ${check.via})`;
    }
    return `  ✗ ${check.user} cannot ${check.access} ${check.path} (via ${check.via}): ${check.detail ?? "denied"}`;
}

export function printStatusReport(report: StatusReport): void {
    const { total, apps, databases } = report.datasetCounts;
    logSection("Service Status");
    console.log(`Datasets: ${total} total, ${apps} apps, ${databases} databases`);
    report.services.forEach((status) => console.log(formatServiceStatus(status)));

    if (report.access.length > 0) {
        logSection("Shared Access");
        report.access.forEach((check) => console.log(formatAccessCheck(check)));
    }

    const ok = report.services.filter((s) => s.problems.length === 0).length;
    const denied = report.access.filter((a) => !a.allowed).length;
    console.log("");
    console.log(`${ok}/${report.services.length} services OK, ${denied} access check(s) failed`);
}
