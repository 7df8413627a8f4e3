/**
 * Options shared by several commands, and the step that turns them into a
 * client and a catalog
 */

import type { Argv } from "yargs";
import { assertValidCatalog, loadCatalog, logInfo, type Catalog } from "@tankctl/shared";
import type { TrueNasClient } from "@tankctl/api";
import {
    createClient,
    describeConnection,
    resolveCatalogOptions,
    resolveConnection,
    type CatalogFlags,
    type ConnectionFlags,
} from "./config.utils.js";

export interface CatalogArgs {
    pool?: string;
    "mount-root"?: string;
}

export interface ConnectionArgs extends CatalogArgs {
    host?: string;
    "api-key"?: string;
    scheme?: string;
    insecure?: boolean;
}

export function withCatalogOptions<T>(yargs: Argv<T>) {
    return yargs
        .option("pool", {
            type: "string",
            describe: "ZFS pool name (env TANKCTL_POOL, default tank)",
        })
        .option("mount-root", {
            type: "string",
            describe: "Where pools are mounted (env TANKCTL_MOUNT_ROOT, default /mnt)",
        });
}

export function withConnectionOptions<T>(yargs: Argv<T>) {
    return withCatalogOptions(yargs)
        .option("host", {
            type: "string",
            describe: "TrueNAS host, optionally with port (env TRUENAS_HOST)",
        })
        .option("api-key", {
            type: "string",
            describe: "TrueNAS API key (env TRUENAS_API_KEY)",
        })
        .option("scheme", {
            type: "string",
            describe: "http or https (env TRUENAS_SCHEME, default https)",
        })
        .option("insecure", {
            type: "boolean",
            describe: "Accept a self-signed certificate (env TRUENAS_INSECURE_TLS)",
        });
}

function catalogFlags(args: CatalogArgs): CatalogFlags {
    return { pool: args.pool, mountRoot: args["mount-root"] };
}

function connectionFlags(args: ConnectionArgs): ConnectionFlags {
    return { host: args.host, apiKey: args["api-key"], scheme: args.scheme, insecure: args.insecure };
}

/**
 * Loads and validates the catalog for the resolved pool and mount root
 */
export async function catalogFromArgs(args: CatalogArgs): Promise<Catalog> {
    const catalog = loadCatalog(await resolveCatalogOptions(catalogFlags(args)));
    assertValidCatalog(catalog);
    return catalog;
}

/**
 * @param announce - print the target (off for machine-readable output)
 */
export async function connectFromArgs(
    args: ConnectionArgs,
    announce = true
): Promise<{ client: TrueNasClient; catalog: Catalog }> {
    const catalog = await catalogFromArgs(args);
    const connection = await resolveConnection(connectionFlags(args));
    if (announce) {
        logInfo(`Connecting to ${describeConnection(connection)}`);
    }
    return { client: createClient(connection), catalog };
}
