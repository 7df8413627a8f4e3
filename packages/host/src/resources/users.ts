/**
 * Service users
 *
 * One command per category creates the accounts with their dataset as home
 * directory, then a single command adds supplementary memberships. Users
 * are preserved on destroy.
 */

import type * as pulumi from "@pulumi/pulumi";
import {
    servicesByCategory,
    type Catalog,
    type GroupMembership,
    type ServiceAccount,
} from "@tankctl/shared";
import { runCommand, script, shellQuote } from "../lib/command.js";

export const SERVICE_SHELL = "/bin/false";

export interface CreateUsersOptions {
    catalog: Catalog;
    dependsOn?: pulumi.Resource[];
}

export interface CreateUsersResult {
    /** Every user and membership command */
    resources: pulumi.Resource[];
    usernames: string[];
}

/**
 * Shell snippet that creates one service account unless it already exists.
 * The home directory is the dataset mountpoint, so it is never created here.
 */
export function userCommand(service: ServiceAccount): string {
    const name = shellQuote(service.name);
    return script([
        `if id ${name} >/dev/null 2>&1; then`,
        `    echo "User ${service.name} already exists"`,
        "else",
        `    useradd -u ${service.uid} -g ${service.gid} -M -d ${shellQuote(service.home)} -s ${SERVICE_SHELL} -c ${shellQuote(service.description)} ${name}`,
        `    echo "Created user: ${service.name} (${service.uid})"`,
        "fi",
    ]);
}

export function membershipCommand(membership: GroupMembership): string {
    return `usermod -a -G ${shellQuote(membership.group)} ${shellQuote(membership.user)}`;
}

export function createUsers(options: CreateUsersOptions): CreateUsersResult {
    const { catalog, dependsOn } = options;
    const resources: pulumi.Resource[] = [];

    for (const [category, services] of servicesByCategory(catalog)) {
        resources.push(
            runCommand({
                name: `users-${category}`,
                create: script(["set -e", ...services.map(userCommand)]),
                dependsOn,
            })
        );
    }

    if (catalog.memberships.length > 0) {
        resources.push(
            runCommand({
                name: "group-memberships",
                create: script([
                    "set -e",
                    ...catalog.memberships.map(membershipCommand),
                    `echo "Added ${catalog.memberships.length} supplementary group memberships"`,
                ]),
                dependsOn: [...resources],
            })
        );
    }

    return { resources, usernames: catalog.services.map((s) => s.name) };
}
