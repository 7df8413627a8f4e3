/**
 * Command execution utilities for Pulumi
 * Wraps @pulumi/command for consistent usage across the provisioning stages
 *
 * Every stage is a set of local commands run on the NAS itself. Scripts are
 * written to be idempotent so `pulumi up` can be repeated safely.
 */

import * as command from "@pulumi/command";
import * as pulumi from "@pulumi/pulumi";

export interface RunCommandOptions {
    /** Unique resource name */
    name: string;
    /** Command to execute on create */
    create: string | pulumi.Output<string>;
    /** Command to execute on delete (optional; omitted means nothing is removed) */
    delete?: string;
    /** Command to execute on update (optional, defaults to create) */
    update?: string | pulumi.Output<string>;
    /** Resources this command depends on */
    dependsOn?: pulumi.Resource[];
    /** Environment variables */
    environment?: Record<string, pulumi.Input<string>>;
    /** Working directory */
    dir?: string;
}

/**
 * Runs a local command
 * Uses @pulumi/command local.Command
 */
export function runCommand(options: RunCommandOptions): command.local.Command {
    const { name, create, delete: deleteCmd, update, dependsOn, environment, dir } = options;

    return new command.local.Command(
        name,
        {
            create,
            delete: deleteCmd,
            update: update ?? create,
            environment,
            dir,
        },
        { dependsOn }
    );
}

export interface WriteFileOptions {
    /** Unique resource name */
    name: string;
    /** Absolute path to the file */
    path: string;
    /** File content */
    content: string | pulumi.Output<string>;
    /** File permissions (octal, e.g., "644") */
    mode?: string;
    /** File owner */
    owner?: string;
    /** File group */
    group?: string;
    /** Resources this depends on */
    dependsOn?: pulumi.Resource[];
}

const HEREDOC_MARKER = "TANKCTL_EOF";

/**
 * Writes a file to the filesystem using a command
 * Handles content escaping and permissions
 */
export function writeFile(options: WriteFileOptions): command.local.Command {
    const { name, path, content, mode = "644", owner = "root", group = "root", dependsOn } = options;
    const target = shellQuote(path);

    // Content already ends with a newline in most renderers; strip one so the
    // heredoc does not add a blank line
    const body = pulumi.output(content).apply((text) => text.replace(/\n$/, ""));

    const createCmd = pulumi.interpolate`cat > ${target} << '${HEREDOC_MARKER}'
${body}
${HEREDOC_MARKER}
chmod ${mode} ${target}
chown ${owner}:${group} ${target}`;

    return new command.local.Command(
        name,
        {
            create: createCmd,
            delete: `rm -f ${target}`,
            update: createCmd,
        },
        { dependsOn }
    );
}

/**
 * Quotes a value for a POSIX shell; plain words are left as they are
 */
export function shellQuote(value: string): string {
    if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) {
        return value;
    }
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Joins script lines, dropping empty ones
 */
export function script(lines: readonly string[]): string {
    return lines.filter((line) => line.length > 0).join("\n");
}
