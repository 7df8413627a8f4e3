/**
 * Unit tests for catalog invariants
 */

import { describe, it, expect } from "vitest";
import { loadCatalog } from "../../src/catalog.js";
import { validateCatalog, assertValidCatalog, CatalogError } from "../../src/validate.js";
import type { Catalog } from "../../src/types.js";

describe("validateCatalog", () => {
    const catalog = loadCatalog();

    it("should accept the bundled catalog", () => {
        expect(validateCatalog(catalog)).toEqual([]);
        expect(() => assertValidCatalog(catalog)).not.toThrow();
    });

    it("should report duplicate uids", () => {
        const broken: Catalog = {
            ...catalog,
            services: [...catalog.services, { ...catalog.services[1], name: "copy" }],
        };
        expect(validateCatalog(broken)).toEqual(["duplicate uid 3001"]);
    });

    it("should report duplicate gids and group names", () => {
        const broken: Catalog = {
            ...catalog,
            groups: [...catalog.groups, { ...catalog.groups[0], category: "media" }],
        };
        expect(validateCatalog(broken)).toEqual([
            "duplicate gid 2000",
            "duplicate group name 'media'",
            "category 'media' maps to 2 groups",
        ]);
    });

    it("should report a category without a group", () => {
        const broken: Catalog = {
            ...catalog,
            groups: catalog.groups.filter((g) => g.name !== "networking"),
        };
        const problems = validateCatalog(broken);
        expect(problems[0]).toBe("category 'network' has no group");
        expect(problems).toContain("service 'pihole' has unmapped category 'network'");
    });

    it("should report memberships naming unknown users or groups", () => {
        const broken: Catalog = {
            ...catalog,
            memberships: [...catalog.memberships, { user: "ghost", group: "phantoms" }],
        };
        expect(validateCatalog(broken)).toEqual([
            "membership names unknown user 'ghost'",
            "membership names unknown group 'phantoms'",
        ]);
    });

    it("should report duplicate datasets and tunables", () => {
        const broken: Catalog = {
            ...catalog,
            datasets: [...catalog.datasets, { ...catalog.datasets[0] }],
            tunables: [...catalog.tunables, { ...catalog.tunables[0] }],
        };
        expect(validateCatalog(broken)).toEqual([
            "duplicate dataset 'apps'",
            "duplicate tunable 'vm.swappiness'",
        ]);
    });

    it("should report a dataset listed before its parent", () => {
        const broken: Catalog = {
            ...catalog,
            datasets: [{ ...catalog.datasets[0], name: "scratch/tmp" }, ...catalog.datasets],
        };
        expect(validateCatalog(broken)).toEqual([
            "dataset 'scratch/tmp' is listed before its parent 'scratch'",
        ]);
    });
});

describe("assertValidCatalog", () => {
    it("should throw a CatalogError listing every problem", () => {
        const catalog = loadCatalog();
        const broken: Catalog = {
            ...catalog,
            memberships: [{ user: "ghost", group: "media" }],
        };

        let caught: unknown;
        try {
            assertValidCatalog(broken);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(CatalogError);
        if (caught instanceof CatalogError) {
            expect(caught.problems).toEqual(["membership names unknown user 'ghost'"]);
            expect(caught.message).toBe(
                "Invalid catalog:\n  - membership names unknown user 'ghost'"
            );
        }
    });
});
