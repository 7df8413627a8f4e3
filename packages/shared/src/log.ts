/**
 * Console logging helpers
 *
 * Info lines go to stdout and can be silenced with TANKCTL_QUIET=1.
 * Warnings and errors always print, errors to stderr.
 */

export function isQuiet(): boolean {
    const value = process.env.TANKCTL_QUIET;
    return value === "1" || value === "true";
}

export function logInfo(message: string): void {
    if (isQuiet()) return;
    console.log(`[INFO] ${message}`);
}

export function logWarn(message: string): void {
    console.warn(`[WARN] ${message}`);
}

export function logError(message: string): void {
    console.error(`[ERROR] ${message}`);
}

/**
 * Prints a section banner: a blank line then "=== Title ==="
 */
export function logSection(title: string): void {
    if (isQuiet()) return;
    console.log("");
    console.log(`=== ${title} ===`);
}
