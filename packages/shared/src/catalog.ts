/**
 * Catalog derivation
 *
 * Turns the raw JSON tables into the resolved catalog for one pool:
 * service accounts with homes, the dataset list, permissions, memberships
 * and snapshot tasks.
 */

import { loadCatalogData, type CatalogData } from "./data.js";
import {
    DEFAULT_MOUNT_ROOT,
    DEFAULT_POOL,
    type Catalog,
    type DatasetSpec,
    type GroupMembership,
    type PermissionSpec,
    type ServiceAccount,
    type ServiceCategory,
    type ServiceDefinition,
    type ServiceGroup,
    type SnapshotTaskSpec,
} from "./types.js";

export interface LoadCatalogOptions {
    pool?: string;
    mountRoot?: string;
    /** Directory with the catalog JSON files (defaults to the bundled data) */
    dataDir?: string;
}

/**
 * Strips leading and trailing slashes from a pool name
 */
export function normalizePool(pool: string): string {
    return pool.trim().replace(/^\/+|\/+$/g, "");
}

/**
 * Removes trailing slashes from a mount root, keeping "/" itself
 */
export function normalizeMountRoot(mountRoot: string): string {
    const trimmed = mountRoot.trim().replace(/\/+$/, "");
    return trimmed === "" ? "/" : trimmed;
}

/**
 * Finds the primary group of a category
 */
export function groupForCategory(
    groups: readonly ServiceGroup[],
    category: ServiceCategory
): ServiceGroup | undefined {
    return groups.find((group) => group.category === category);
}

/**
 * Dataset of a service, relative to the pool
 */
export function datasetForService(service: Pick<ServiceDefinition, "name" | "category">): string {
    return service.category === "database" ? `databases/${service.name}` : `apps/${service.name}`;
}

/**
 * Home directory of a service: the mountpoint of its dataset
 */
export function homeForService(
    service: Pick<ServiceDefinition, "name" | "category">,
    pool: string = DEFAULT_POOL,
    mountRoot: string = DEFAULT_MOUNT_ROOT
): string {
    return joinMount(normalizeMountRoot(mountRoot), normalizePool(pool), datasetForService(service));
}

function joinMount(mountRoot: string, pool: string, relative: string): string {
    const base = mountRoot === "/" ? `/${pool}` : `${mountRoot}/${pool}`;
    return relative === "" ? base : `${base}/${relative}`;
}

/**
 * Absolute path of a pool-relative dataset or directory
 */
export function poolPath(catalog: Pick<Catalog, "pool" | "mountRoot">, relative: string): string {
    return joinMount(catalog.mountRoot, catalog.pool, relative);
}

/**
 * Full ZFS dataset name, e.g. "tank/apps/grafana"
 */
export function fullDatasetName(catalog: Pick<Catalog, "pool">, relative: string): string {
    return relative === "" ? catalog.pool : `${catalog.pool}/${relative}`;
}

/**
 * Groups the services of a catalog by category, in category order of first appearance
 */
export function servicesByCategory(
    catalog: Pick<Catalog, "services">
): Map<ServiceCategory, ServiceAccount[]> {
    const result = new Map<ServiceCategory, ServiceAccount[]>();
    for (const service of catalog.services) {
        const list = result.get(service.category);
        if (list) {
            list.push(service);
        } else {
            result.set(service.category, [service]);
        }
    }
    return result;
}

/**
 * Services included in on-demand snapshot runs
 */
export function manualSnapshotServices(catalog: Pick<Catalog, "services">): ServiceAccount[] {
    return catalog.services.filter((service) => service.manualSnapshot === true);
}

// ============================================================================
// Derivation
// ============================================================================

function resolveServices(
    data: CatalogData,
    pool: string,
    mountRoot: string
): ServiceAccount[] {
    return data.services.map((service) => {
        const group = groupForCategory(data.groups, service.category);
        const dataset = datasetForService(service);
        return {
            ...service,
            // An unmapped category is reported by validateCatalog
            group: group?.name ?? "",
            gid: group?.gid ?? -1,
            dataset,
            home: joinMount(mountRoot, pool, dataset),
        };
    });
}

function resolveDatasets(data: CatalogData, services: readonly ServiceAccount[]): DatasetSpec[] {
    const { defaults, categoryRecordsize } = data.datasets;
    const make = (name: string, overrides: Partial<DatasetSpec>): DatasetSpec => ({
        name,
        recordsize: overrides.recordsize ?? defaults.recordsize,
        compression: overrides.compression ?? defaults.compression,
        atime: defaults.atime,
        xattr: defaults.xattr,
    });

    const datasets: DatasetSpec[] = data.datasets.base.map((t) => make(t.name, t));

    for (const service of services) {
        if (service.category === "database") continue;
        datasets.push(make(service.dataset, { recordsize: service.recordsize }));
    }
    for (const service of services) {
        if (service.category !== "database") continue;
        datasets.push(
            make(service.dataset, {
                recordsize: service.recordsize ?? categoryRecordsize.database,
            })
        );
    }

    datasets.push(...data.datasets.extra.map((t) => make(t.name, t)));

    for (const dir of logDirNames(data, services)) {
        datasets.push(make(`logs/${dir}`, {}));
    }
    return datasets;
}

function logDirNames(data: CatalogData, services: readonly ServiceAccount[]): string[] {
    return [
        ...services.filter((s) => s.category !== "database").map((s) => s.name),
        ...data.datasets.systemLogDirs,
    ];
}

function resolvePermissions(
    data: CatalogData,
    services: readonly ServiceAccount[]
): PermissionSpec[] {
    const { appModes, databaseMode, shared, logs } = data.permissions;
    const permissions: PermissionSpec[] = [];

    for (const service of services) {
        const mode =
            service.category === "database"
                ? databaseMode
                : (appModes[service.category] ?? appModes.default);
        permissions.push({
            path: service.dataset,
            owner: service.name,
            group: service.group,
            mode,
            recursive: true,
        });
    }

    permissions.push(...shared.map((entry) => ({ ...entry })));
    permissions.push({ path: "logs", ...logs.root, recursive: false });

    for (const dir of logDirNames(data, services)) {
        const override = logs.overrides.find((o) => o.name === dir);
        const owner = override ?? logs.dir;
        permissions.push({
            path: `logs/${dir}`,
            owner: owner.owner,
            group: owner.group,
            mode: owner.mode,
            recursive: false,
        });
    }
    return permissions;
}

function resolveMemberships(
    data: CatalogData,
    services: readonly ServiceAccount[]
): GroupMembership[] {
    const memberships: GroupMembership[] = [];
    for (const [group, users] of Object.entries(data.memberships)) {
        for (const user of users) {
            const service = services.find((s) => s.name === user);
            // Already a member through the primary group
            if (service?.group === group) continue;
            memberships.push({ user, group });
        }
    }
    return memberships;
}

function resolveSnapshotTasks(
    data: CatalogData,
    services: readonly ServiceAccount[]
): SnapshotTaskSpec[] {
    const tasks: SnapshotTaskSpec[] = data.snapshots.tasks.map((task) => ({
        ...task,
        exclude: [...task.exclude],
        schedule: { ...task.schedule },
        lifetime: { ...task.lifetime },
    }));

    for (const service of services) {
        if (service.category === "database") continue;
        const tier = data.snapshots.tiers[service.snapshotTier];
        tasks.push({
            name: `${service.name} (${service.snapshotTier})`,
            dataset: service.dataset,
            recursive: false,
            exclude: [],
            schedule: { ...tier.schedule },
            lifetime: { ...tier.lifetime },
            namingSchema: `${service.snapshotTier}-${service.name}-%Y%m%d-%H%M`,
            allowEmpty: false,
            enabled: true,
        });
    }
    return tasks;
}

/**
 * Resolves raw catalog data for a pool and mount root
 */
export function buildCatalog(data: CatalogData, options: LoadCatalogOptions = {}): Catalog {
    const pool = normalizePool(options.pool ?? DEFAULT_POOL);
    const mountRoot = normalizeMountRoot(options.mountRoot ?? DEFAULT_MOUNT_ROOT);
    const services = resolveServices(data, pool, mountRoot);

    const catalog: Catalog = {
        pool,
        mountRoot,
        groups: data.groups.map((group) => ({ ...group })),
        services,
        memberships: resolveMemberships(data, services),
        datasets: resolveDatasets(data, services),
        permissions: resolvePermissions(data, services),
        acls: data.permissions.acl.map((grant) => ({ ...grant })),
        snapshotTiers: data.snapshots.tiers,
        snapshotTasks: resolveSnapshotTasks(data, services),
        prunePolicies: data.snapshots.prune.map((policy) => ({ ...policy })),
        tunables: data.tunables.map((tunable) => ({ ...tunable })),
    };
    return deepFreeze(catalog);
}

/**
 * Loads the bundled catalog data and resolves it for a pool
 */
export function loadCatalog(options: LoadCatalogOptions = {}): Catalog {
    return buildCatalog(loadCatalogData(options.dataDir), options);
}

function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
