/**
 * Shared catalog types for tankctl
 *
 * These interfaces describe the static provisioning catalog (groups, service
 * accounts, datasets, permissions, snapshot tasks, tunables) and are used by
 * both the shell-mode host program and the REST client.
 */

/**
 * Service category. Every category maps to exactly one primary group.
 */
export const SERVICE_CATEGORIES = [
    "media",
    "download",
    "security",
    "web",
    "devops",
    "monitoring",
    "containers",
    "storage",
    "network",
    "automation",
    "database",
] as const;

export type ServiceCategory = (typeof SERVICE_CATEGORIES)[number];

/** ZFS recordsize values used by the catalog */
export const RECORDSIZES = ["8K", "16K", "64K", "128K", "1M"] as const;

export type Recordsize = (typeof RECORDSIZES)[number];

/**
 * Snapshot tier of a service: how often its dataset is snapshotted
 * and how long the snapshots are kept.
 */
export const SNAPSHOT_TIERS = ["critical", "important", "standard", "low"] as const;

export type SnapshotTier = (typeof SNAPSHOT_TIERS)[number];

export type SnapshotFrequency = "15min" | "4h" | "daily" | "weekly";

/** TrueNAS snapshot lifetime unit */
export type LifetimeUnit = "HOUR" | "DAY" | "WEEK" | "MONTH" | "YEAR";

export interface Lifetime {
    value: number;
    unit: LifetimeUnit;
}

/**
 * Cron-style schedule in the field names the TrueNAS API uses
 */
export interface CronSchedule {
    minute: string;
    hour: string;
    dom: string;
    month: string;
    dow: string;
}

/**
 * A Unix group shared by one category of services
 */
export interface ServiceGroup {
    name: string;
    gid: number;
    description: string;
    /** The service category whose members use this as their primary group */
    category: ServiceCategory;
}

/**
 * A service account as stored in the catalog data
 */
export interface ServiceDefinition {
    name: string;
    uid: number;
    category: ServiceCategory;
    description: string;
    snapshotTier: SnapshotTier;
    /** Dataset recordsize override (default depends on the category) */
    recordsize?: Recordsize;
    /** Included in on-demand "snapshot now" runs */
    manualSnapshot?: boolean;
}

/**
 * A fully resolved service account
 */
export interface ServiceAccount extends ServiceDefinition {
    /** Primary group name */
    group: string;
    gid: number;
    /** Home directory, the mountpoint of the service's dataset */
    home: string;
    /** Dataset name relative to the pool */
    dataset: string;
}

/**
 * Supplementary group membership (usermod -a -G)
 */
export interface GroupMembership {
    user: string;
    group: string;
}

export type CompressionSetting = "lz4" | "zstd" | "off";

export interface DatasetSpec {
    /** Dataset name relative to the pool, e.g. "apps/grafana" */
    name: string;
    recordsize: Recordsize;
    compression: CompressionSetting;
    atime: "on" | "off";
    xattr: "sa" | "on";
}

/**
 * Ownership and mode for a path below the pool mountpoint
 */
export interface PermissionSpec {
    /** Path relative to the pool mountpoint */
    path: string;
    owner: string;
    group: string;
    /** Octal mode string, e.g. "750" or "2775" */
    mode: string;
    recursive: boolean;
}

/**
 * Cross-group POSIX ACL grant (setfacl -m g:<group>:<perms>)
 */
export interface AclGrant {
    path: string;
    group: string;
    perms: "rx" | "rwx";
}

export interface SnapshotTaskSpec {
    /** Human-readable task label (not sent to the API) */
    name: string;
    /** Dataset relative to the pool */
    dataset: string;
    recursive: boolean;
    /** Excluded datasets, relative to the pool */
    exclude: string[];
    schedule: CronSchedule;
    lifetime: Lifetime;
    namingSchema: string;
    allowEmpty: boolean;
    enabled: boolean;
}

export interface SnapshotTierPolicy {
    frequency: SnapshotFrequency;
    schedule: CronSchedule;
    lifetime: Lifetime;
}

/**
 * Retention rule applied by "snapshot prune"
 */
export interface PrunePolicy {
    dataset: string;
    keepDays: number;
    /** Snapshot name prefix the policy applies to */
    prefix: string;
}

export type TunableType = "SYSCTL" | "ZFS";

export interface TunableSpec {
    var: string;
    type: TunableType;
    value: string;
    comment: string;
}

/**
 * The resolved provisioning catalog for one pool
 */
export interface Catalog {
    pool: string;
    /** Where pools are mounted, normally /mnt */
    mountRoot: string;
    groups: ServiceGroup[];
    services: ServiceAccount[];
    memberships: GroupMembership[];
    datasets: DatasetSpec[];
    permissions: PermissionSpec[];
    acls: AclGrant[];
    snapshotTiers: Record<SnapshotTier, SnapshotTierPolicy>;
    snapshotTasks: SnapshotTaskSpec[];
    prunePolicies: PrunePolicy[];
    tunables: TunableSpec[];
}

/**
 * Default pool name
 */
export const DEFAULT_POOL = "tank";

/**
 * Default mount root for TrueNAS pools
 */
export const DEFAULT_MOUNT_ROOT = "/mnt";
