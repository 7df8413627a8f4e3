/**
 * Ownership, modes and ACL grants
 *
 * Runs after users exist, since chown resolves names. A missing path is a
 * warning, not a failure: the dataset may have been skipped on this pool.
 */

import type * as pulumi from "@pulumi/pulumi";
import { poolPath, type AclGrant, type Catalog, type PermissionSpec } from "@tankctl/shared";
import { runCommand, script, shellQuote } from "../lib/command.js";

export interface SetPermissionsOptions {
    catalog: Catalog;
    /** Skip setfacl grants entirely */
    skipAcl?: boolean;
    dependsOn?: pulumi.Resource[];
}

export interface SetPermissionsResult {
    resources: pulumi.Resource[];
}

export function permissionCommand(
    catalog: Pick<Catalog, "pool" | "mountRoot">,
    permission: PermissionSpec
): string {
    const path = shellQuote(poolPath(catalog, permission.path));
    const flag = permission.recursive ? " -R" : "";
    return script([
        `if [ -e ${path} ]; then`,
        `    chown${flag} ${permission.owner}:${permission.group} ${path}`,
        `    chmod${flag} ${permission.mode} ${path}`,
        `    echo "Set ${permission.owner}:${permission.group} ${permission.mode} on ${poolPath(catalog, permission.path)}"`,
        "else",
        `    echo "[WARN] ${poolPath(catalog, permission.path)} does not exist, skipping"`,
        "fi",
    ]);
}

/**
 * setfacl lines for one grant: the access entry and the default entry new files inherit
 */
export function aclCommands(catalog: Pick<Catalog, "pool" | "mountRoot">, grant: AclGrant): string[] {
    const path = shellQuote(poolPath(catalog, grant.path));
    const entry = `g:${grant.group}:${grant.perms}`;
    return [`setfacl -R -m ${entry} ${path}`, `setfacl -R -d -m ${entry} ${path}`];
}

export function aclScript(catalog: Pick<Catalog, "pool" | "mountRoot" | "acls">): string {
    return script([
        "if command -v setfacl >/dev/null 2>&1; then",
        ...catalog.acls.flatMap((grant) => aclCommands(catalog, grant)).map((line) => `    ${line}`),
        `    echo "Applied ${catalog.acls.length} ACL grants"`,
        "else",
        `    echo "[WARN] setfacl not available, skipping ACL grants"`,
        "fi",
    ]);
}

/**
 * Permissions grouped by the first segment of their path, keeping catalog order
 */
export function permissionGroups(permissions: readonly PermissionSpec[]): Map<string, PermissionSpec[]> {
    const groups = new Map<string, PermissionSpec[]>();
    for (const permission of permissions) {
        const root = permission.path.split("/")[0];
        groups.set(root, [...(groups.get(root) ?? []), permission]);
    }
    return groups;
}

export function setPermissions(options: SetPermissionsOptions): SetPermissionsResult {
    const { catalog, skipAcl = false, dependsOn } = options;
    const resources: pulumi.Resource[] = [];

    for (const [root, members] of permissionGroups(catalog.permissions)) {
        resources.push(
            runCommand({
                name: `permissions-${root}`,
                create: script(["set -e", ...members.map((permission) => permissionCommand(catalog, permission))]),
                dependsOn,
            })
        );
    }

    if (!skipAcl && catalog.acls.length > 0) {
        resources.push(
            runCommand({
                name: "acl-grants",
                create: aclScript(catalog),
                dependsOn: [...resources],
            })
        );
    }

    return { resources };
}
