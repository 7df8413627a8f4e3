/**
 * bootstrap command - Create the automation account provisioning logs in as
 *
 * The account gets its own group, SSH key login, no password and
 * passwordless sudo. Rerunning it on an existing account refreshes the key.
 */

import { readFile } from "node:fs/promises";
import type { CommandModule } from "yargs";
import { confirm } from "@inquirer/prompts";
import { logSection, poolPath, type Catalog } from "@tankctl/shared";
import {
    BOOTSTRAP_SHELL,
    DEFAULT_BOOTSTRAP_UID,
    DEFAULT_BOOTSTRAP_USER,
    bootstrapAccount,
    isSshPublicKey,
    type BootstrapResult,
    type TrueNasClient,
} from "@tankctl/api";
import { connectFromArgs, withConnectionOptions, type ConnectionArgs } from "../utils/options.utils.js";

interface BootstrapArgs extends ConnectionArgs {
    "ssh-key-file": string;
    username: string;
    uid: number;
    home?: string;
    yes: boolean;
}

export interface BootstrapCommandOptions {
    sshKeyFile: string;
    username?: string;
    uid?: number;
    /** Defaults to <mount-root>/<pool>/system/<username> */
    home?: string;
    /** Skip the confirmation prompt */
    yes?: boolean;
}

/**
 * First public key line of an authorized_keys-style file
 */
export async function readPublicKey(file: string): Promise<string> {
    const content = await readFile(file, "utf8");
    const line = content
        .split("\n")
        .map((l) => l.trim())
        .find((l) => l !== "" && !l.startsWith("#"));
    if (!line || !isSshPublicKey(line)) {
        throw new Error(`${file} does not contain an OpenSSH public key`);
    }
    return line;
}

export async function runBootstrap(
    client: TrueNasClient,
    catalog: Catalog,
    options: BootstrapCommandOptions
): Promise<BootstrapResult | undefined> {
    const username = options.username ?? DEFAULT_BOOTSTRAP_USER;
    const uid = options.uid ?? DEFAULT_BOOTSTRAP_UID;
    const home = options.home ?? poolPath(catalog, `system/${username}`);
    const sshPublicKey = await readPublicKey(options.sshKeyFile);

    logSection("Automation Account");
    console.log(`  Username:  ${username}`);
    console.log(`  UID/GID:   ${uid}`);
    console.log(`  Home:      ${home}`);
    console.log(`  Shell:     ${BOOTSTRAP_SHELL}`);
    console.log(`  SSH key:   ${sshPublicKey.split(" ")[0]} from ${options.sshKeyFile}`);
    console.log("  Sudo:      ALL, no password");
    console.log("");

    if (!options.yes) {
        const proceed = await confirm({
            message: `Create or update '${username}' on the NAS?`,
            default: false,
        });
        if (!proceed) {
            console.log("Cancelled.");
            return undefined;
        }
    }

    const result = await bootstrapAccount(client, { username, uid, sshPublicKey, home });
    console.log("");
    console.log(`✓ Group ${result.group === "created" ? "created" : "already present"}, user ${result.user}`);
    console.log("Next steps:");
    console.log(`  1. Test: ssh ${username}@<nas> sudo -n true`);
    console.log("  2. Provision: tankctl apply");
    return result;
}

export const bootstrapCommand: CommandModule<{}, BootstrapArgs> = {
    command: "bootstrap",
    describe: "Create the automation account (SSH key, passwordless sudo)",
    builder: (yargs) =>
        withConnectionOptions(yargs)
            .option("ssh-key-file", {
                type: "string",
                demandOption: true,
                describe: "Public key file for the account",
            })
            .option("username", {
                type: "string",
                default: DEFAULT_BOOTSTRAP_USER,
                describe: "Account name",
            })
            .option("uid", {
                type: "number",
                default: DEFAULT_BOOTSTRAP_UID,
                describe: "UID, also used as the GID of its group",
            })
            .option("home", {
                type: "string",
                describe: "Home directory (default <mount-root>/<pool>/system/<username>)",
            })
            .option("yes", {
                type: "boolean",
                alias: "y",
                default: false,
                describe: "Do not ask for confirmation",
            }),
    handler: async (argv) => {
        const { client, catalog } = await connectFromArgs(argv);
        await runBootstrap(client, catalog, {
            sshKeyFile: argv.sshKeyFile,
            username: argv.username,
            uid: argv.uid,
            home: argv.home,
            yes: argv.yes,
        });
    },
};
