/**
 * Plans and applies every configured account
 */

import { buildAccountPlans } from "@accountsmith/shared";
import { applyAccountPlan } from "./resources/index";
import type { AccountSummary, HostConfig } from "./config/types";

export interface ProvisionResult {
    /** Stack outputs keyed by request id */
    summaries: Record<string, AccountSummary>;
    /** Request ids whose parameters failed validation */
    failed: string[];
}

/**
 * Registers resources for every valid account. Invalid accounts are
 * reported and skipped so the remaining accounts still converge.
 */
export function provisionAccounts(config: HostConfig): ProvisionResult {
    const summaries: Record<string, AccountSummary> = {};
    const failed: string[] = [];

    for (const result of buildAccountPlans(config.accounts, { osFamily: config.osFamily })) {
        if (!result.ok) {
            console.error(`[${result.requestId}] ${result.error.message}`);
            failed.push(result.requestId);
            continue;
        }

        const { plan, requestId } = result;
        for (const warning of plan.warnings) {
            console.warn(`[${requestId}] ${warning.message}`);
        }

        applyAccountPlan(plan, { requestId });
        summaries[requestId] = {
            username: plan.spec.username,
            homeDir: plan.spec.homeDir,
            ensure: plan.spec.ensure,
            descriptors: plan.descriptors.map((d) => d.id),
        };
        console.log(
            `[${requestId}] ${plan.spec.ensure === "present" ? "Provisioning" : "Removing"} ` +
                `${plan.spec.username} (${plan.descriptors.length} resources)`
        );
    }

    return { summaries, failed };
}
