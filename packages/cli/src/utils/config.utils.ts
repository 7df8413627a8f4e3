/**
 * Connection and pool settings for commands that talk to the NAS
 *
 * Priority for every setting:
 *   1. Explicit flag
 *   2. Environment (TRUENAS_HOST, TRUENAS_API_KEY, ...)
 *   3. Pulumi config: tankctl:<key> (the API key is stored as a secret)
 *   4. Default, or ConfigError when the setting is required
 */

import { execa } from "execa";
import { DEFAULT_MOUNT_ROOT, DEFAULT_POOL, type LoadCatalogOptions } from "@tankctl/shared";
import { TrueNasClient } from "@tankctl/api";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export type Scheme = "http" | "https";

export interface ConnectionFlags {
    host?: string;
    apiKey?: string;
    scheme?: string;
    insecure?: boolean;
}

export interface CatalogFlags {
    pool?: string;
    mountRoot?: string;
}

export interface Connection {
    host: string;
    apiKey: string;
    scheme: Scheme;
    allowInsecureTls: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Reads tankctl:<key> from the current Pulumi stack; undefined when unset
 * or when pulumi is not available
 */
export async function readPulumiConfig(key: string): Promise<string | undefined> {
    const result = await execa("pulumi", ["config", "get", `tankctl:${key}`], {
        reject: false,
    });
    const value = typeof result.stdout === "string" ? result.stdout.trim() : "";
    return result.exitCode === 0 && value ? value : undefined;
}

async function firstOf(
    flag: string | undefined,
    envValue: string | undefined,
    pulumiKey: string
): Promise<string | undefined> {
    if (flag) return flag;
    if (envValue) return envValue;
    return readPulumiConfig(pulumiKey);
}

function parseBoolean(value: string, source: string): boolean {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes"].includes(normalized)) return true;
    if (["0", "false", "no", ""].includes(normalized)) return false;
    throw new ConfigError(`${source} must be true or false (got '${value}')`);
}

function parseScheme(value: string): Scheme {
    if (value === "http" || value === "https") return value;
    throw new ConfigError(`Scheme must be http or https (got '${value}')`);
}

export async function resolveConnection(
    flags: ConnectionFlags,
    env: Env = process.env
): Promise<Connection> {
    const host = await firstOf(flags.host, env.TRUENAS_HOST, "truenas-host");
    if (!host) {
        throw new ConfigError(
            "TrueNAS host not set: pass --host, set TRUENAS_HOST, or run 'tankctl setup'"
        );
    }

    const apiKey = await firstOf(flags.apiKey, env.TRUENAS_API_KEY, "truenas-api-key");
    if (!apiKey) {
        throw new ConfigError(
            "TrueNAS API key not set: pass --api-key, set TRUENAS_API_KEY, or run 'tankctl setup'"
        );
    }

    const scheme = parseScheme(
        (await firstOf(flags.scheme, env.TRUENAS_SCHEME, "truenas-scheme")) ?? "https"
    );

    let allowInsecureTls = false;
    if (flags.insecure !== undefined) {
        allowInsecureTls = flags.insecure;
    } else if (env.TRUENAS_INSECURE_TLS !== undefined) {
        allowInsecureTls = parseBoolean(env.TRUENAS_INSECURE_TLS, "TRUENAS_INSECURE_TLS");
    } else {
        const stored = await readPulumiConfig("truenas-insecure-tls");
        allowInsecureTls = stored === undefined ? false : parseBoolean(stored, "tankctl:truenas-insecure-tls");
    }

    return { host, apiKey, scheme, allowInsecureTls };
}

export async function resolveCatalogOptions(
    flags: CatalogFlags,
    env: Env = process.env
): Promise<Required<Pick<LoadCatalogOptions, "pool" | "mountRoot">>> {
    return {
        pool: (await firstOf(flags.pool, env.TANKCTL_POOL, "pool")) ?? DEFAULT_POOL,
        mountRoot: (await firstOf(flags.mountRoot, env.TANKCTL_MOUNT_ROOT, "mount-root")) ?? DEFAULT_MOUNT_ROOT,
    };
}

/**
 * Shows only the last four characters of a secret
 */
export function maskSecret(secret: string): string {
    return secret.length > 4 ? `****${secret.slice(-4)}` : "****";
}

export function createClient(connection: Connection): TrueNasClient {
    return new TrueNasClient({
        host: connection.host,
        apiKey: connection.apiKey,
        scheme: connection.scheme,
        allowInsecureTls: connection.allowInsecureTls,
    });
}

export function describeConnection(connection: Connection): string {
    const tls = connection.scheme === "https" && connection.allowInsecureTls ? ", TLS not verified" : "";
    return `${connection.scheme}://${connection.host} (API key ${maskSecret(connection.apiKey)}${tls})`;
}
