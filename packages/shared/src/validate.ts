/**
 * Catalog invariants
 */

import { SERVICE_CATEGORIES, type Catalog } from "./types.js";
import { groupForCategory } from "./catalog.js";

/**
 * Thrown when a catalog breaks one or more invariants
 */
export class CatalogError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid catalog:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
        this.name = "CatalogError";
    }
}

function duplicates<T>(items: readonly T[]): T[] {
    const seen = new Set<T>();
    const dupes = new Set<T>();
    for (const item of items) {
        if (seen.has(item)) dupes.add(item);
        seen.add(item);
    }
    return [...dupes];
}

/**
 * Checks a catalog and returns every problem found (empty when valid)
 */
export function validateCatalog(catalog: Catalog): string[] {
    const problems: string[] = [];

    for (const uid of duplicates(catalog.services.map((s) => s.uid))) {
        problems.push(`duplicate uid ${uid}`);
    }
    for (const gid of duplicates(catalog.groups.map((g) => g.gid))) {
        problems.push(`duplicate gid ${gid}`);
    }
    for (const name of duplicates(catalog.services.map((s) => s.name))) {
        problems.push(`duplicate service name '${name}'`);
    }
    for (const name of duplicates(catalog.groups.map((g) => g.name))) {
        problems.push(`duplicate group name '${name}'`);
    }
    for (const name of duplicates(catalog.datasets.map((d) => d.name))) {
        problems.push(`duplicate dataset '${name}'`);
    }
    for (const name of duplicates(catalog.tunables.map((t) => t.var))) {
        problems.push(`duplicate tunable '${name}'`);
    }

    for (const category of SERVICE_CATEGORIES) {
        const mapped = catalog.groups.filter((g) => g.category === category);
        if (mapped.length === 0) {
            problems.push(`category '${category}' has no group`);
        } else if (mapped.length > 1) {
            problems.push(`category '${category}' maps to ${mapped.length} groups`);
        }
    }
    for (const service of catalog.services) {
        if (!groupForCategory(catalog.groups, service.category)) {
            problems.push(`service '${service.name}' has unmapped category '${service.category}'`);
        }
    }

    const userNames = new Set(catalog.services.map((s) => s.name));
    const groupNames = new Set(catalog.groups.map((g) => g.name));
    for (const { user, group } of catalog.memberships) {
        if (!userNames.has(user)) problems.push(`membership names unknown user '${user}'`);
        if (!groupNames.has(group)) problems.push(`membership names unknown group '${group}'`);
    }

    // zfs create needs the parent to exist first
    const seen = new Set<string>();
    for (const dataset of catalog.datasets) {
        const slash = dataset.name.lastIndexOf("/");
        if (slash > 0) {
            const parent = dataset.name.slice(0, slash);
            if (!seen.has(parent)) {
                problems.push(`dataset '${dataset.name}' is listed before its parent '${parent}'`);
            }
        }
        seen.add(dataset.name);
    }

    return problems;
}

/**
 * Throws a CatalogError listing every problem, if there are any
 */
export function assertValidCatalog(catalog: Catalog): void {
    const problems = validateCatalog(catalog);
    if (problems.length > 0) {
        throw new CatalogError(problems);
    }
}
