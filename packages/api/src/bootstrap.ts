/**
 * Automation account bootstrap
 *
 * Creates the account later provisioning runs log in as: its own group,
 * SSH key authentication, password login disabled, passwordless sudo.
 */

import { logInfo } from "@tankctl/shared";
import type { TrueNasClient } from "./client.js";

export const DEFAULT_BOOTSTRAP_USER = "provisioner";
export const DEFAULT_BOOTSTRAP_UID = 1500;
export const BOOTSTRAP_SHELL = "/usr/bin/bash";

const SSH_KEY_PATTERN = /^(ssh-ed25519|ssh-rsa|ecdsa-sha2-nistp\d+|sk-ssh-ed25519@openssh\.com) [A-Za-z0-9+/=]+( .*)?$/;

export interface BootstrapOptions {
    username?: string;
    /** Used as both uid and gid */
    uid?: number;
    /** OpenSSH public key line */
    sshPublicKey: string;
    /** Home directory, created by the middleware */
    home: string;
}

export interface BootstrapResult {
    username: string;
    group: "created" | "existing";
    user: "created" | "updated";
}

export function isSshPublicKey(line: string): boolean {
    return SSH_KEY_PATTERN.test(line.trim());
}

export async function bootstrapAccount(
    client: TrueNasClient,
    options: BootstrapOptions
): Promise<BootstrapResult> {
    const username = options.username ?? DEFAULT_BOOTSTRAP_USER;
    const uid = options.uid ?? DEFAULT_BOOTSTRAP_UID;
    const sshpubkey = options.sshPublicKey.trim();
    if (!isSshPublicKey(sshpubkey)) {
        throw new Error("Not an OpenSSH public key (expected e.g. 'ssh-ed25519 AAAA... comment')");
    }

    let groupOutcome: BootstrapResult["group"] = "existing";
    let groupId = (await client.groups.findByName(username))?.id;
    if (groupId === undefined) {
        groupId = await client.groups.create({ name: username, gid: uid, smb: false });
        groupOutcome = "created";
        logInfo(`Created group: ${username} (${uid})`);
    }

    const existing = await client.users.findByName(username);
    if (existing) {
        await client.users.update(existing.id, {
            sshpubkey,
            sudo_commands_nopasswd: ["ALL"],
            password_disabled: true,
        });
        logInfo(`Updated user: ${username} (SSH key and sudo)`);
        return { username, group: groupOutcome, user: "updated" };
    }

    await client.users.create({
        username,
        uid,
        group: groupId,
        group_create: false,
        groups: [],
        home: options.home,
        home_create: true,
        full_name: "tankctl automation",
        shell: BOOTSTRAP_SHELL,
        password_disabled: true,
        smb: false,
        sudo_commands_nopasswd: ["ALL"],
        sshpubkey,
    });
    logInfo(`Created user: ${username} (${uid})`);
    return { username, group: groupOutcome, user: "created" };
}
