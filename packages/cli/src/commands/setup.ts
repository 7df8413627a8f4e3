/**
 * setup command - Interactive setup wizard
 *
 * Prompts for the NAS connection and pool layout and stores them in the
 * current Pulumi stack (tankctl:*), where both the CLI and the host program
 * read them. The API key is stored as a secret.
 */

import type { CommandModule } from "yargs";
import { input, password, confirm } from "@inquirer/prompts";
import { execa } from "execa";
import { DEFAULT_MOUNT_ROOT, DEFAULT_POOL } from "@tankctl/shared";
import { maskSecret } from "../utils/config.utils.js";

export interface SetupAnswers {
    host: string;
    scheme: "http" | "https";
    insecureTls: boolean;
    apiKey: string;
    pool: string;
    mountRoot: string;
    helperDir: string;
    skipAcl: boolean;
}

async function runPulumiConfig(key: string, value: string, secret = false): Promise<void> {
    const args = ["config", "set", `tankctl:${key}`, value];
    if (secret) {
        args.push("--secret");
    }
    await execa("pulumi", args, { stdio: "inherit" });
}

async function checkPulumiStack(): Promise<boolean> {
    const result = await execa("pulumi", ["stack", "--show-name"], { reject: false });
    return result.exitCode === 0;
}

const POOL_NAME = /^[A-Za-z][A-Za-z0-9_.:-]*$/;

export async function promptSetup(): Promise<SetupAnswers> {
    console.log("\nTrueNAS Connection\n");

    const host = await input({
        message: "TrueNAS host (name or address, optional :port):",
        validate: (v) => v.trim().length > 0 || "Host is required",
    });

    const useHttps = await confirm({ message: "Use HTTPS?", default: true });
    const insecureTls = useHttps
        ? await confirm({ message: "Accept a self-signed certificate?", default: false })
        : false;

    const apiKey = await password({
        message: "API key (Credentials > API Keys):",
        validate: (v) => v.length > 0 || "API key is required",
    });

    console.log("\nPool Layout\n");

    const pool = await input({
        message: "ZFS pool:",
        default: DEFAULT_POOL,
        validate: (v) => POOL_NAME.test(v) || "Pool names start with a letter",
    });

    const useDefaults = await confirm({
        message: `Use defaults for mount root (${DEFAULT_MOUNT_ROOT}), helper files (/root) and ACL grants (on)?`,
        default: true,
    });

    let mountRoot = DEFAULT_MOUNT_ROOT;
    let helperDir = "/root";
    let skipAcl = false;

    if (!useDefaults) {
        mountRoot = await input({
            message: "Mount root:",
            default: DEFAULT_MOUNT_ROOT,
            validate: (v) => v.startsWith("/") || "Must be an absolute path",
        });

        helperDir = await input({
            message: "Directory for the reference and docker env files:",
            default: "/root",
            validate: (v) => v.startsWith("/") || "Must be an absolute path",
        });

        skipAcl = !(await confirm({ message: "Apply cross-group ACL grants (setfacl)?", default: true }));
    }

    return {
        host: host.trim(),
        scheme: useHttps ? "https" : "http",
        insecureTls,
        apiKey,
        pool,
        mountRoot,
        helperDir,
        skipAcl,
    };
}

export async function saveSetup(answers: SetupAnswers): Promise<void> {
    await runPulumiConfig("truenas-host", answers.host);
    await runPulumiConfig("truenas-scheme", answers.scheme);
    await runPulumiConfig("truenas-insecure-tls", String(answers.insecureTls));
    await runPulumiConfig("truenas-api-key", answers.apiKey, true);
    await runPulumiConfig("pool", answers.pool);
    await runPulumiConfig("mount-root", answers.mountRoot);
    await runPulumiConfig("helper-dir", answers.helperDir);
    await runPulumiConfig("skip-acl", String(answers.skipAcl));
}

export async function runSetup(): Promise<void> {
    console.log("\ntankctl Setup\n");
    console.log("Stores the NAS connection and pool settings in the current Pulumi stack.\n");

    if (!(await checkPulumiStack())) {
        console.log("No Pulumi stack found. Creating one...\n");
        const stackName = await input({ message: "Stack name:", default: "nas" });
        await execa("pulumi", ["stack", "init", stackName], { stdio: "inherit" });
        console.log();
    }

    const answers = await promptSetup();

    console.log("\nConfiguration Summary\n");
    console.log(`  Host:          ${answers.scheme}://${answers.host}`);
    console.log(`  Self-signed:   ${answers.insecureTls ? "accepted" : "rejected"}`);
    console.log(`  API key:       ${maskSecret(answers.apiKey)}`);
    console.log(`  Pool:          ${answers.pool}`);
    console.log(`  Mount root:    ${answers.mountRoot}`);
    console.log(`  Helper files:  ${answers.helperDir}`);
    console.log(`  ACL grants:    ${answers.skipAcl ? "skipped" : "applied"}`);
    console.log();

    const proceed = await confirm({ message: "Save this configuration?", default: true });
    if (!proceed) {
        console.log("\nSetup cancelled.\n");
        return;
    }

    console.log("\nSaving configuration...\n");
    await saveSetup(answers);

    console.log("\nConfiguration saved successfully!\n");
    console.log("Next steps:");
    console.log("  1. Review: pulumi config");
    console.log("  2. Preview: tankctl plan");
    console.log("  3. Provision over the API: tankctl apply");
    console.log("     or on the NAS itself: pulumi up");
    console.log();
}

export const setupCommand: CommandModule = {
    command: "setup",
    describe: "Interactive setup wizard (configure Pulumi)",
    builder: {},
    handler: async () => {
        await runSetup();
    },
};
