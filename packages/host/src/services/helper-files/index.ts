/**
 * Helper files written next to the provisioned system
 *
 * - users_groups_reference.txt: human-readable list of groups and users
 * - docker_users.env: NAME_UID / NAME_GID variables for compose files
 * - snapshot_tasks.json: periodic snapshot tasks for import, since shell
 *   mode cannot reach the middleware API
 */

import path from "node:path";
import type * as pulumi from "@pulumi/pulumi";
import {
    renderDockerEnv,
    renderReference,
    renderSnapshotTasksJson,
    type Catalog,
} from "@tankctl/shared";
import { writeFile } from "../../lib/command.js";

export const REFERENCE_FILE = "users_groups_reference.txt";
export const DOCKER_ENV_FILE = "docker_users.env";

export interface WriteHelperFilesOptions {
    catalog: Catalog;
    /** Directory for the reference and env files */
    helperDir: string;
    dependsOn?: pulumi.Resource[];
    /**
     * Timestamp for the reference header. Left out by default so the file
     * content stays the same between runs
     */
    generatedAt?: Date;
}

export interface WriteHelperFilesResult {
    resources: pulumi.Resource[];
    referencePath: string;
    dockerEnvPath: string;
}

export function writeHelperFiles(options: WriteHelperFilesOptions): WriteHelperFilesResult {
    const { catalog, helperDir, dependsOn, generatedAt } = options;
    const referencePath = path.posix.join(helperDir, REFERENCE_FILE);
    const dockerEnvPath = path.posix.join(helperDir, DOCKER_ENV_FILE);

    const reference = writeFile({
        name: "users-groups-reference",
        path: referencePath,
        content: renderReference(catalog, generatedAt),
        mode: "644",
        dependsOn,
    });

    const dockerEnv = writeFile({
        name: "docker-users-env",
        path: dockerEnvPath,
        content: renderDockerEnv(catalog),
        mode: "644",
        dependsOn,
    });

    return { resources: [reference, dockerEnv], referencePath, dockerEnvPath };
}

export interface WriteSnapshotTasksOptions {
    catalog: Catalog;
    file: string;
    dependsOn?: pulumi.Resource[];
}

export function writeSnapshotTasks(options: WriteSnapshotTasksOptions): pulumi.Resource {
    const { catalog, file, dependsOn } = options;
    return writeFile({
        name: "snapshot-tasks-json",
        path: file,
        content: renderSnapshotTasksJson(catalog),
        mode: "644",
        dependsOn,
    });
}
