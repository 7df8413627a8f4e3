/**
 * Host checks
 *
 * Shell-mode provisioning runs on the NAS itself: Linux, as root.
 */

import * as os from "node:os";

/**
 * Returns true if running on Linux
 */
export function isLinux(): boolean {
    return process.platform === "linux";
}

/**
 * Returns true if the process runs as uid 0
 */
export function isRoot(): boolean {
    return typeof process.getuid === "function" && process.getuid() === 0;
}

/**
 * Gets the current username
 */
export function getCurrentUsername(): string {
    return os.userInfo().username;
}

/**
 * Throws unless this host can run the shell-mode provisioner
 *
 * @param requireRoot - also require uid 0 (skipped for previews)
 */
export function assertProvisioningHost(requireRoot = true): void {
    if (!isLinux()) {
        throw new Error(
            `Shell-mode provisioning only runs on the TrueNAS SCALE host (Linux), not ${process.platform}.\n` +
                "Use 'tankctl apply' to provision over the REST API from another machine."
        );
    }
    if (requireRoot && !isRoot()) {
        throw new Error(
            `This program must be run as root (current user: ${getCurrentUsername()})`
        );
    }
}

/**
 * Logs a banner naming the pool being provisioned
 */
export function logBanner(pool: string): void {
    console.log("");
    console.log("================================================================================");
    console.log(`  tankctl - Provisioning pool '${pool}' on ${os.hostname()}`);
    console.log("================================================================================");
    console.log("");
}
