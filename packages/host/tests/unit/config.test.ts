/**
 * Unit tests for the tankctl Pulumi config loader
 */

import { describe, it, expect } from "vitest";
import * as pulumi from "@pulumi/pulumi";
import { DEFAULT_HOST_CONFIG, getConfig } from "../../src/config/index.js";

describe("getConfig", () => {
    it("should fall back to the defaults", () => {
        expect(getConfig()).toEqual(DEFAULT_HOST_CONFIG);
        expect(DEFAULT_HOST_CONFIG).toEqual({
            pool: "tank",
            mountRoot: "/mnt",
            skipAcl: false,
            helperDir: "/root",
            snapshotTasksFile: "/tmp/snapshot_tasks.json",
        });
    });

    it("should read tankctl:* keys", () => {
        pulumi.runtime.setConfig("tankctl:pool", "fast");
        pulumi.runtime.setConfig("tankctl:skip-acl", "true");
        pulumi.runtime.setConfig("tankctl:helper-dir", "/root/tankctl");

        const config = getConfig();

        expect(config.pool).toBe("fast");
        expect(config.skipAcl).toBe(true);
        expect(config.helperDir).toBe("/root/tankctl");
        expect(config.mountRoot).toBe("/mnt");
    });
});
