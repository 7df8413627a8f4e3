/**
 * Apply order
 *
 * Groups come before users (users reference them), datasets before users
 * (homes live inside them), users and datasets before permissions (chown
 * needs both). Snapshot tasks and tunables go last.
 */

export const APPLY_STAGES = [
    "groups",
    "datasets",
    "users",
    "permissions",
    "snapshots",
    "tunables",
] as const;

export type ApplyStage = (typeof APPLY_STAGES)[number];

export function isApplyStage(name: string): name is ApplyStage {
    return APPLY_STAGES.some((stage) => stage === name);
}

function parseStageNames(names: readonly string[], flag: string): Set<ApplyStage> {
    const result = new Set<ApplyStage>();
    for (const raw of names) {
        for (const name of raw.split(",").map((n) => n.trim()).filter(Boolean)) {
            if (!isApplyStage(name)) {
                throw new Error(
                    `Unknown stage '${name}' in ${flag} (expected one of: ${APPLY_STAGES.join(", ")})`
                );
            }
            result.add(name);
        }
    }
    return result;
}

/**
 * Returns the stages to run, always in apply order
 *
 * @param only - stage names to keep (all when empty); comma-separated values are split
 * @param skip - stage names to drop
 */
export function selectStages(
    only: readonly string[] = [],
    skip: readonly string[] = []
): ApplyStage[] {
    const onlySet = parseStageNames(only, "--only");
    const skipSet = parseStageNames(skip, "--skip");
    return APPLY_STAGES.filter(
        (stage) => (onlySet.size === 0 || onlySet.has(stage)) && !skipSet.has(stage)
    );
}
