/**
 * Readers for the JSON catalog files under packages/shared/data.
 *
 * Each file is checked against a zod schema, so the rest of the code can
 * rely on the catalog types.
 */

import { readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z, type ZodIssue } from "zod";
import { RECORDSIZES, SERVICE_CATEGORIES, SNAPSHOT_TIERS } from "./types.js";

/**
 * Thrown when a catalog data file cannot be read or does not match its schema
 */
export class CatalogDataError extends Error {
    constructor(
        message: string,
        public readonly file: string,
        public readonly issues: readonly ZodIssue[] = []
    ) {
        super(`${file}: ${message}`);
        this.name = "CatalogDataError";
    }

    static fromZodError(file: string, error: z.ZodError): CatalogDataError {
        const [first] = error.issues;
        const more = error.issues.length > 1 ? ` (and ${error.issues.length - 1} more)` : "";
        return new CatalogDataError(`${issuePath(first.path)}: ${first.message}${more}`, file, error.issues);
    }
}

/**
 * services[0].category style path for an issue
 */
export function issuePath(segments: ReadonlyArray<string | number>): string {
    if (segments.length === 0) return "root";
    return segments
        .map((segment, i) => (typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
        .join("");
}

const CategorySchema = z.enum(SERVICE_CATEGORIES);
const RecordsizeSchema = z.enum(RECORDSIZES);
const CompressionSchema = z.enum(["lz4", "zstd", "off"]);

const GroupsFileSchema = z.object({
    groups: z.array(
        z.object({
            name: z.string().min(1),
            gid: z.number().int(),
            description: z.string(),
            category: CategorySchema,
        })
    ),
});

const ServicesFileSchema = z.object({
    services: z.array(
        z.object({
            name: z.string().min(1),
            uid: z.number().int(),
            category: CategorySchema,
            description: z.string(),
            snapshotTier: z.enum(SNAPSHOT_TIERS),
            recordsize: RecordsizeSchema.optional(),
            manualSnapshot: z.boolean().optional(),
        })
    ),
});

const MembershipsFileSchema = z.object({
    /** group name -> member user names */
    memberships: z.record(z.string(), z.array(z.string())),
});

const DatasetTemplateSchema = z.object({
    name: z.string().min(1),
    recordsize: RecordsizeSchema,
    compression: CompressionSchema.optional(),
});

const DatasetsFileSchema = z.object({
    defaults: z.object({
        recordsize: RecordsizeSchema,
        compression: CompressionSchema,
        atime: z.enum(["on", "off"]),
        xattr: z.enum(["sa", "on"]),
    }),
    categoryRecordsize: z.record(CategorySchema, RecordsizeSchema),
    base: z.array(DatasetTemplateSchema),
    extra: z.array(DatasetTemplateSchema),
    /** Log directories that are not tied to a service */
    systemLogDirs: z.array(z.string()),
});

const ModeSchema = z.string().regex(/^[0-7]{3,4}$/, "must be an octal mode");

const OwnerModeSchema = z.object({
    owner: z.string().min(1),
    group: z.string().min(1),
    mode: ModeSchema,
});

const PermissionsFileSchema = z.object({
    appModes: z
        .record(z.union([z.literal("default"), CategorySchema]), ModeSchema)
        .and(z.object({ default: ModeSchema })),
    databaseMode: ModeSchema,
    shared: z.array(OwnerModeSchema.extend({ path: z.string().min(1), recursive: z.boolean() })),
    logs: z.object({
        root: OwnerModeSchema,
        dir: OwnerModeSchema,
        overrides: z.array(OwnerModeSchema.extend({ name: z.string().min(1) })),
    }),
    acl: z.array(
        z.object({
            path: z.string().min(1),
            group: z.string().min(1),
            perms: z.enum(["rx", "rwx"]),
        })
    ),
});

const ScheduleSchema = z.object({
    minute: z.string(),
    hour: z.string(),
    dom: z.string(),
    month: z.string(),
    dow: z.string(),
});

const LifetimeSchema = z.object({
    value: z.number().int(),
    unit: z.enum(["HOUR", "DAY", "WEEK", "MONTH", "YEAR"]),
});

const TierPolicySchema = z.object({
    frequency: z.enum(["15min", "4h", "daily", "weekly"]),
    schedule: ScheduleSchema,
    lifetime: LifetimeSchema,
});

const SnapshotsFileSchema = z.object({
    tiers: z.object({
        critical: TierPolicySchema,
        important: TierPolicySchema,
        standard: TierPolicySchema,
        low: TierPolicySchema,
    }),
    tasks: z.array(
        z.object({
            name: z.string(),
            dataset: z.string().min(1),
            recursive: z.boolean(),
            exclude: z.array(z.string()),
            schedule: ScheduleSchema,
            lifetime: LifetimeSchema,
            namingSchema: z.string().min(1),
            allowEmpty: z.boolean(),
            enabled: z.boolean(),
        })
    ),
    prune: z.array(
        z.object({
            dataset: z.string().min(1),
            keepDays: z.number().int(),
            prefix: z.string(),
        })
    ),
});

const TunablesFileSchema = z.object({
    tunables: z.array(
        z.object({
            var: z.string().min(1),
            type: z.enum(["SYSCTL", "ZFS"]),
            value: z.string(),
            comment: z.string(),
        })
    ),
});

export type DatasetTemplate = z.infer<typeof DatasetTemplateSchema>;
export type DatasetData = z.infer<typeof DatasetsFileSchema>;
export type OwnerMode = z.infer<typeof OwnerModeSchema>;
export type PermissionData = z.infer<typeof PermissionsFileSchema>;
export type SnapshotData = z.infer<typeof SnapshotsFileSchema>;

/**
 * Everything under data/, before it is resolved for a pool
 */
export interface CatalogData {
    groups: z.infer<typeof GroupsFileSchema>["groups"];
    services: z.infer<typeof ServicesFileSchema>["services"];
    memberships: z.infer<typeof MembershipsFileSchema>["memberships"];
    datasets: DatasetData;
    permissions: PermissionData;
    snapshots: SnapshotData;
    tunables: z.infer<typeof TunablesFileSchema>["tunables"];
}

/**
 * Directory holding the catalog JSON files
 */
export function getDataDir(): string {
    const here = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(here, "..", "data");
}

function readJson(dataDir: string, file: string): unknown {
    const fullPath = path.join(dataDir, file);
    let text: string;
    try {
        text = readFileSync(fullPath, "utf8");
    } catch (err) {
        throw new CatalogDataError(`cannot read ${fullPath}: ${String(err)}`, file);
    }
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new CatalogDataError(`invalid JSON: ${String(err)}`, file);
    }
}

function readFile<T>(dataDir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const result = schema.safeParse(readJson(dataDir, file));
    if (!result.success) {
        throw CatalogDataError.fromZodError(file, result.error);
    }
    return result.data;
}

/**
 * Reads and checks every catalog file in `dataDir`
 */
export function loadCatalogData(dataDir: string = getDataDir()): CatalogData {
    return {
        groups: readFile(dataDir, "groups.json", GroupsFileSchema).groups,
        services: readFile(dataDir, "services.json", ServicesFileSchema).services,
        memberships: readFile(dataDir, "memberships.json", MembershipsFileSchema).memberships,
        datasets: readFile(dataDir, "datasets.json", DatasetsFileSchema),
        permissions: readFile(dataDir, "permissions.json", PermissionsFileSchema),
        snapshots: readFile(dataDir, "snapshots.json", SnapshotsFileSchema),
        tunables: readFile(dataDir, "tunables.json", TunablesFileSchema).tunables,
    };
}
