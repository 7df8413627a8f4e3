/**
 * Service status report
 *
 * Reads each service's dataset and mountpoint from the NAS and works out,
 * from the live owner and mode bits, whether the service can still use its
 * own dataset and the shared trees its extra groups give it.
 */

import {
    fullDatasetName,
    poolPath,
    type Catalog,
    type PermissionSpec,
    type ServiceAccount,
    type ServiceCategory,
} from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";
import { TrueNasApiError } from "./errors.js";
import { indexBy, modeString, propertyBytes, sameMode } from "./payloads.js";
import type { FileStat, TrueNasDataset } from "./types.js";

export type AccessKind = "read" | "write";

// Directories: listing needs r and x, creating entries needs w and x
const ACCESS_BITS: Record<AccessKind, number> = {
    read: 0o5,
    write: 0o3,
};

export interface ServiceStatus {
    service: string;
    category: ServiceCategory;
    /** Full dataset name */
    dataset: string;
    present: boolean;
    usedBytes?: number;
    /** Live owner, group and mode of the mountpoint */
    stat?: FileStat;
    /** Empty when the mountpoint matches the catalog */
    problems: string[];
}

export interface AccessCheck {
    user: string;
    path: string;
    access: AccessKind;
    /** Group the access is expected through */
    via: string;
    allowed: boolean;
    detail?: string;
}

export interface StatusReport {
    datasetCounts: { total: number; apps: number; databases: number };
    services: ServiceStatus[];
    access: AccessCheck[];
    healthy: boolean;
}

/**
 * Whether a user with the given ids gets the access from the mode bits.
 * Root always does; POSIX ACLs are not considered.
 */
export function hasAccess(stat: FileStat, uid: number, gids: readonly number[], access: AccessKind): boolean {
    if (uid === 0) return true;
    const shift = stat.uid === uid ? 6 : gids.includes(stat.gid) ? 3 : 0;
    const bits = (stat.mode >> shift) & 0o7;
    return (bits & ACCESS_BITS[access]) === ACCESS_BITS[access];
}

/**
 * Primary and supplementary gids of a service, per the catalog
 */
export function serviceGids(catalog: Pick<Catalog, "groups" | "memberships">, service: ServiceAccount): number[] {
    const gids = [service.gid];
    for (const membership of catalog.memberships) {
        if (membership.user !== service.name) continue;
        const group = catalog.groups.find((g) => g.name === membership.group);
        if (group) gids.push(group.gid);
    }
    return gids;
}

/**
 * Access the group bits of a shared tree hand to the group's extra members
 */
function groupAccess(permission: PermissionSpec): AccessKind | undefined {
    const groupBits = (parseInt(permission.mode, 8) >> 3) & 0o7;
    if (groupBits & 0o2) return "write";
    if (groupBits & 0o4) return "read";
    return undefined;
}

/**
 * Cross-group checks: every supplementary member of a top-level shared
 * tree's group should get the access its group bits grant
 */
export function sharedAccessChecks(
    catalog: Pick<Catalog, "services" | "memberships" | "permissions">
): Array<{ service: ServiceAccount; permission: PermissionSpec; access: AccessKind }> {
    const serviceDatasets = new Set(catalog.services.map((s) => s.dataset));
    const checks: Array<{ service: ServiceAccount; permission: PermissionSpec; access: AccessKind }> = [];
    for (const permission of catalog.permissions) {
        if (permission.path.includes("/") || serviceDatasets.has(permission.path)) continue;
        const access = groupAccess(permission);
        if (!access) continue;
        for (const membership of catalog.memberships) {
            if (membership.group !== permission.group) continue;
            const service = catalog.services.find((s) => s.name === membership.user);
            if (service) checks.push({ service, permission, access });
        }
    }
    return checks;
}

export function countDatasets(
    datasets: readonly Pick<TrueNasDataset, "name">[],
    pool: string
): StatusReport["datasetCounts"] {
    const under = (prefix: string): number => datasets.filter((d) => d.name.startsWith(prefix)).length;
    return {
        total: datasets.filter((d) => d.name === pool).length + under(`${pool}/`),
        apps: under(`${pool}/apps/`),
        databases: under(`${pool}/databases/`),
    };
}

class StatusCollector {
    private readonly stats = new Map<string, FileStat | undefined>();

    constructor(
        private readonly client: TrueNasClient,
        private readonly catalog: Catalog
    ) {}

    async stat(path: string): Promise<FileStat | undefined> {
        if (this.stats.has(path)) return this.stats.get(path);
        let stat: FileStat | undefined;
        try {
            stat = await this.client.filesystem.stat(path);
        } catch (err) {
            if (!(err instanceof TrueNasApiError && err.isMissingPath)) throw err;
        }
        this.stats.set(path, stat);
        return stat;
    }

    async service(service: ServiceAccount, live: TrueNasDataset | undefined): Promise<ServiceStatus> {
        const status: ServiceStatus = {
            service: service.name,
            category: service.category,
            dataset: fullDatasetName(this.catalog, service.dataset),
            present: live !== undefined,
            problems: [],
        };
        if (!live) {
            status.problems.push("dataset missing");
            return status;
        }
        status.usedBytes = propertyBytes(live.used);

        const stat = await this.stat(service.home);
        if (!stat) {
            status.problems.push(`mountpoint ${service.home} missing`);
            return status;
        }
        status.stat = stat;

        if (stat.uid !== service.uid) status.problems.push(`owner uid ${stat.uid}, expected ${service.uid}`);
        if (stat.gid !== service.gid) status.problems.push(`group gid ${stat.gid}, expected ${service.gid}`);
        const permission = this.catalog.permissions.find((p) => p.path === service.dataset);
        if (permission && !sameMode(permission.mode, stat.mode)) {
            status.problems.push(`mode ${modeString(stat.mode)}, expected ${permission.mode}`);
        }
        if (!hasAccess(stat, service.uid, serviceGids(this.catalog, service), "write")) {
            status.problems.push(`not writable by ${service.name}`);
        }
        return status;
    }

    async access(service: ServiceAccount, permission: PermissionSpec, access: AccessKind): Promise<AccessCheck> {
        const path = poolPath(this.catalog, permission.path);
        const check: AccessCheck = { user: service.name, path, access, via: permission.group, allowed: false };
        const stat = await this.stat(path);
        if (!stat) {
            check.detail = "path missing";
            return check;
        }
        check.allowed = hasAccess(stat, service.uid, serviceGids(this.catalog, service), access);
        if (!check.allowed) {
            check.detail = `${stat.uid}:${stat.gid} ${modeString(stat.mode)}`;
        }
        return check;
    }
}

/**
 * Dataset counts, per-service dataset and mountpoint checks, and the
 * cross-group access checks for the shared trees
 */
export async function serviceStatus(client: TrueNasClient, catalog: Catalog): Promise<StatusReport> {
    const datasets = await client.datasets.list();
    const byName = indexBy(datasets, (d) => d.name);
    const collector = new StatusCollector(client, catalog);

    const services: ServiceStatus[] = [];
    for (const service of catalog.services) {
        services.push(await collector.service(service, byName.get(fullDatasetName(catalog, service.dataset))));
    }

    const access: AccessCheck[] = [];
    for (const { service, permission, access: kind } of sharedAccessChecks(catalog)) {
        access.push(await collector.access(service, permission, kind));
    }

    return {
        datasetCounts: countDatasets(datasets, catalog.pool),
        services,
        access,
        healthy: services.every((s) => s.problems.length === 0) && access.every((a) => a.allowed),
    };
}
