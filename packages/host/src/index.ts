/**
 * tankctl - Shell-mode provisioner (Pulumi program)
 *
 * Provisions a TrueNAS SCALE host with local commands, run on the NAS:
 * 1. Groups
 * 2. Datasets - mountpoints become the users' home directories
 * 3. Users - and their supplementary group memberships
 * 4. Permissions - chown/chmod and ACL grants, once users and datasets exist
 * 5. Snapshot tasks - written as JSON for import (no API in shell mode)
 *
 * Tunables are applied over the REST API with `tankctl apply --only tunables`.
 *
 * Run with: pulumi up
 */

import * as pulumi from "@pulumi/pulumi";
import {
    APPLY_STAGES,
    assertProvisioningHost,
    assertValidCatalog,
    loadCatalog,
    logBanner,
} from "@tankctl/shared";
import { getConfig } from "./config/index.js";
import { createGroups } from "./resources/groups.js";
import { createDatasets } from "./resources/datasets.js";
import { createUsers } from "./resources/users.js";
import { setPermissions } from "./resources/permissions.js";
import { writeHelperFiles, writeSnapshotTasks } from "./services/helper-files/index.js";

// ============================================================================
// Host Check and Banner
// ============================================================================

const config = getConfig();

logBanner(config.pool);

// Previews only read the program, so they may run unprivileged
assertProvisioningHost(!pulumi.runtime.isDryRun());

const catalog = loadCatalog({ pool: config.pool, mountRoot: config.mountRoot });
assertValidCatalog(catalog);

console.log(`Mount root: ${catalog.mountRoot}`);
console.log(`Catalog: ${catalog.groups.length} groups, ${catalog.services.length} users, ${catalog.datasets.length} datasets`);
console.log(`Apply order: ${APPLY_STAGES.join(" -> ")}`);
console.log("");

// ============================================================================
// Phase 1: Groups
// ============================================================================

const groups = createGroups({ catalog });

// ============================================================================
// Phase 2: Datasets
// ============================================================================

const datasets = createDatasets({
    catalog,
    dependsOn: groups.resources,
});

// ============================================================================
// Phase 3: Users
// ============================================================================

// Homes are dataset mountpoints, so users wait for every dataset tree
const users = createUsers({
    catalog,
    dependsOn: datasets.resources,
});

// ============================================================================
// Phase 4: Permissions
// ============================================================================

const permissions = setPermissions({
    catalog,
    skipAcl: config.skipAcl,
    dependsOn: users.resources,
});

// ============================================================================
// Phase 5: Snapshot Tasks and Helper Files
// ============================================================================

const _snapshotTasks = writeSnapshotTasks({
    catalog,
    file: config.snapshotTasksFile,
    dependsOn: permissions.resources,
});

const helperFiles = writeHelperFiles({
    catalog,
    helperDir: config.helperDir,
    dependsOn: users.resources,
});

// ============================================================================
// Exports
// ============================================================================

function getPostDeploymentInstructions(): string {
    return `
================================================================================
PROVISIONING COMPLETE - Next Steps:
================================================================================

1. IMPORT SNAPSHOT TASKS:
   Shell mode cannot reach the middleware API. Either import
   ${config.snapshotTasksFile} through the web UI, or run from any machine:

   tankctl apply --only snapshots

2. APPLY TUNABLES:

   tankctl apply --only tunables

3. USE THE HELPER FILES:
   ${helperFiles.referencePath}
   ${helperFiles.dockerEnvPath}  (source it in docker compose projects)

4. CHECK FOR DRIFT:

   tankctl drift

================================================================================
`;
}

export const outputs = {
    pool: catalog.pool,
    groups: catalog.groups.length,
    users: users.usernames.length,
    datasets: datasets.datasets.length,
    snapshotTasksFile: config.snapshotTasksFile,
    referenceFile: helperFiles.referencePath,
    dockerEnvFile: helperFiles.dockerEnvPath,
    postDeploymentInstructions: getPostDeploymentInstructions(),
};
