/**
 * Service groups
 *
 * Groups exist before any user references them as a primary or
 * supplementary group. Destroy leaves them in place.
 */

import type * as pulumi from "@pulumi/pulumi";
import type { Catalog, ServiceGroup } from "@tankctl/shared";
import { runCommand, script, shellQuote } from "../lib/command.js";

export interface CreateGroupsOptions {
    catalog: Catalog;
    dependsOn?: pulumi.Resource[];
}

export interface CreateGroupsResult {
    resources: pulumi.Resource[];
}

/**
 * Shell snippet that creates one group unless it already exists
 */
export function groupCommand(group: Pick<ServiceGroup, "name" | "gid">): string {
    const name = shellQuote(group.name);
    return script([
        `if getent group ${name} >/dev/null; then`,
        `    echo "Group ${group.name} already exists"`,
        "else",
        `    groupadd -g ${group.gid} ${name}`,
        `    echo "Created group: ${group.name} (${group.gid})"`,
        "fi",
    ]);
}

export function createGroups(options: CreateGroupsOptions): CreateGroupsResult {
    const { catalog, dependsOn } = options;

    const groups = runCommand({
        name: "create-service-groups",
        create: script(["set -e", ...catalog.groups.map(groupCommand)]),
        dependsOn,
    });

    return { resources: [groups] };
}
