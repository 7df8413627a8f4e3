/**
 * Helper file renderers
 *
 * Text written next to a provisioned system for operators and for Docker
 * Compose: a human-readable users/groups reference, a UID/GID env file and
 * the snapshot task list in TrueNAS API field names.
 */

import { fullDatasetName, servicesByCategory } from "./catalog.js";
import type { Catalog, ServiceCategory, SnapshotTaskSpec } from "./types.js";

export const CATEGORY_TITLES: Record<ServiceCategory, string> = {
    media: "Media Services",
    download: "Download Services",
    security: "Security Services",
    web: "Web Services",
    devops: "DevOps Services",
    monitoring: "Monitoring Services",
    containers: "Container Management",
    storage: "Storage Services",
    network: "Network Services",
    automation: "Automation Services",
    database: "Database Services",
};

/**
 * Environment variable prefix for a user or group name
 */
export function envName(name: string): string {
    return name.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Renders users_groups_reference.txt; the Generated header line is only
 * written when a timestamp is given
 */
export function renderReference(catalog: Catalog, generatedAt?: Date): string {
    const lines: string[] = [
        "# TrueNAS SCALE Users and Groups Reference",
        "# ==========================================",
    ];
    if (generatedAt) {
        lines.push(`# Generated: ${generatedAt.toISOString()}`);
    }
    lines.push("", `## Service Groups (${plural(catalog.groups.length, "group")})`);
    for (const group of catalog.groups) {
        lines.push(`- ${group.name} (${group.gid}): ${group.description}`);
    }

    lines.push("", `## Service Users by Category (${catalog.services.length} users total)`);
    for (const [category, services] of servicesByCategory(catalog)) {
        lines.push("", `### ${CATEGORY_TITLES[category]} (${plural(services.length, "user")})`);
        for (const service of services) {
            lines.push(`- ${service.name} (${service.uid}): ${service.description}`);
        }
    }

    if (catalog.memberships.length > 0) {
        lines.push("", "## Supplementary Group Memberships");
        for (const { user, group } of catalog.memberships) {
            lines.push(`- ${user} -> ${group}`);
        }
    }

    return lines.join("\n") + "\n";
}

/**
 * Renders docker_users.env
 */
export function renderDockerEnv(catalog: Catalog): string {
    const lines: string[] = [
        "# Docker Compose User/Group Environment Variables",
        "# Source this in your .env file or docker-compose.yml",
    ];
    for (const [category, services] of servicesByCategory(catalog)) {
        lines.push("", `# ${CATEGORY_TITLES[category]}`);
        for (const service of services) {
            const prefix = envName(service.name);
            lines.push(`${prefix}_UID=${service.uid}`, `${prefix}_GID=${service.gid}`);
        }
    }

    lines.push("", "# Common Group IDs");
    for (const group of catalog.groups) {
        lines.push(`${envName(group.name)}_GID=${group.gid}`);
    }
    return lines.join("\n") + "\n";
}

/**
 * A snapshot task in TrueNAS API field names, with full dataset names
 */
export interface SnapshotTaskDocument {
    name: string;
    dataset: string;
    recursive: boolean;
    exclude?: string[];
    schedule: SnapshotTaskSpec["schedule"];
    lifetime_value: number;
    lifetime_unit: string;
    naming_schema: string;
    allow_empty: boolean;
    enabled: boolean;
}

export function toSnapshotTaskDocument(
    catalog: Pick<Catalog, "pool">,
    task: SnapshotTaskSpec
): SnapshotTaskDocument {
    const doc: SnapshotTaskDocument = {
        name: task.name,
        dataset: fullDatasetName(catalog, task.dataset),
        recursive: task.recursive,
        schedule: { ...task.schedule },
        lifetime_value: task.lifetime.value,
        lifetime_unit: task.lifetime.unit,
        naming_schema: task.namingSchema,
        allow_empty: task.allowEmpty,
        enabled: task.enabled,
    };
    if (task.exclude.length > 0) {
        doc.exclude = task.exclude.map((name) => fullDatasetName(catalog, name));
    }
    return doc;
}

/**
 * Renders snapshot_tasks.json for import through the web UI
 */
export function renderSnapshotTasksJson(catalog: Catalog): string {
    const document = {
        snapshot_tasks: catalog.snapshotTasks.map((task) => toSnapshotTaskDocument(catalog, task)),
    };
    return JSON.stringify(document, null, 2) + "\n";
}
