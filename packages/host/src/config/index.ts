/**
 * Configuration loader for the shell-mode provisioner
 * Loads configuration from the `tankctl` Pulumi config namespace
 */

import * as pulumi from "@pulumi/pulumi";
import { DEFAULT_MOUNT_ROOT, DEFAULT_POOL } from "@tankctl/shared";

export interface HostConfig {
    /** ZFS pool every dataset lives under */
    pool: string;
    /** Where pools are mounted */
    mountRoot: string;
    /** Skip setfacl grants */
    skipAcl: boolean;
    /** Directory the reference and env helper files are written to */
    helperDir: string;
    /** Where the snapshot task JSON is written for import */
    snapshotTasksFile: string;
}

export const DEFAULT_HOST_CONFIG: HostConfig = {
    pool: DEFAULT_POOL,
    mountRoot: DEFAULT_MOUNT_ROOT,
    skipAcl: false,
    helperDir: "/root",
    snapshotTasksFile: "/tmp/snapshot_tasks.json",
};

/**
 * Reads tankctl:* keys, falling back to the defaults
 */
export function getConfig(): HostConfig {
    const config = new pulumi.Config("tankctl");

    return {
        pool: config.get("pool") ?? DEFAULT_HOST_CONFIG.pool,
        mountRoot: config.get("mount-root") ?? DEFAULT_HOST_CONFIG.mountRoot,
        skipAcl: config.getBoolean("skip-acl") ?? DEFAULT_HOST_CONFIG.skipAcl,
        helperDir: config.get("helper-dir") ?? DEFAULT_HOST_CONFIG.helperDir,
        snapshotTasksFile: config.get("snapshot-tasks-file") ?? DEFAULT_HOST_CONFIG.snapshotTasksFile,
    };
}
