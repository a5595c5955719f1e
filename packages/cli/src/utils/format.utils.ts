/**
 * Human-readable rendering of account plans
 */

import type { AccountPlan, AccountPlanResult, ResourceDescriptor } from "@accountsmith/shared";

export function formatDescriptor(descriptor: ResourceDescriptor): string {
    switch (descriptor.kind) {
        case "group":
            return descriptor.gid === undefined
                ? `group ${descriptor.name}`
                : `group ${descriptor.name} gid=${descriptor.gid}`;
        case "user": {
            const parts = [`user ${descriptor.name}`];
            if (descriptor.uid !== undefined) parts.push(`uid=${descriptor.uid}`);
            parts.push(`primary=${descriptor.primaryGroup}`, `shell=${descriptor.shell}`);
            if (descriptor.supplementaryGroups.length > 0) {
                parts.push(`groups=${descriptor.supplementaryGroups.join(",")}`);
            }
            return parts.join(" ");
        }
        case "directory":
            return descriptor.mode === undefined
                ? `directory ${descriptor.path}`
                : `directory ${descriptor.path} ${descriptor.owner ?? "?"}:${descriptor.group ?? "?"} ${descriptor.mode}`;
        case "sshKey":
            return `ssh-key ${descriptor.name} ${descriptor.type}`;
    }
}

/**
 * Renders one plan: a header line, then one line per descriptor prefixed
 * with its rank. Descriptors sharing a rank may be applied in any order.
 */
export function formatPlan(requestId: string, plan: AccountPlan): string[] {
    const { spec } = plan;
    const lines = [`${requestId}: ${spec.ensure} ${spec.username} -> ${spec.homeDir}`];
    plan.descriptors.forEach((descriptor, index) => {
        const rank = plan.operations[index]?.rank ?? index;
        lines.push(`  [${rank}] ${formatDescriptor(descriptor)}`);
    });
    return lines;
}

/**
 * JSON view of plan results, as printed by `plan --json`
 */
export function planResultsToJson(results: AccountPlanResult[]): unknown[] {
    return results.map((result) =>
        result.ok
            ? {
                  requestId: result.requestId,
                  ok: true,
                  warnings: result.plan.warnings,
                  descriptors: result.plan.descriptors,
              }
            : {
                  requestId: result.requestId,
                  ok: false,
                  error: { field: result.error.field, message: result.error.message },
              }
    );
}
