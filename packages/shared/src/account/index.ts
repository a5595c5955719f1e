/**
 * Account planning pipeline
 *
 * raw parameters -> parse -> resolve -> consolidate keys -> plan -> emit
 */

import type { AccountPlan, AccountsInput } from "../types";
import { ValidationError } from "./errors";
import { parseAccountParams } from "./params";
import { resolveAccount } from "./resolver";
import { consolidateSSHKeys } from "./ssh-keys";
import { planAccount } from "./planner";
import { emitDescriptors } from "./emitter";

export interface BuildAccountPlanOptions {
    /** OS family used for home directory defaults, e.g. "Debian" or "Solaris" */
    osFamily: string;
    /** Identifier of the provisioning request; username defaults to it */
    requestId?: string;
}

/**
 * Builds the complete plan for one account.
 * Throws ValidationError before any operation is planned when the input is invalid.
 */
export function buildAccountPlan(raw: unknown, options: BuildAccountPlanOptions): AccountPlan {
    const params = parseAccountParams(raw, options.requestId);
    const { spec, warnings: resolveWarnings } = resolveAccount(params, options.osFamily);
    const { entries, warnings: keyWarnings } = consolidateSSHKeys({
        username: spec.username,
        ensure: spec.ensure,
        legacyKey: params.ssh_key,
        legacyType: params.ssh_key_type,
        keyMapping: params.ssh_keys,
    });
    const operations = planAccount(spec, entries);

    return {
        spec,
        sshKeys: entries,
        operations,
        descriptors: emitDescriptors(operations),
        warnings: [...resolveWarnings, ...keyWarnings],
    };
}

export type AccountPlanResult =
    | { requestId: string; ok: true; plan: AccountPlan }
    | { requestId: string; ok: false; error: ValidationError };

/**
 * Plans every account independently. A validation failure only aborts
 * the account it belongs to; any other error propagates.
 */
export function buildAccountPlans(
    accounts: AccountsInput,
    options: Omit<BuildAccountPlanOptions, "requestId">
): AccountPlanResult[] {
    return Object.entries(accounts).map(([requestId, raw]): AccountPlanResult => {
        try {
            return { requestId, ok: true, plan: buildAccountPlan(raw, { ...options, requestId }) };
        } catch (err) {
            if (err instanceof ValidationError) {
                return { requestId, ok: false, error: err };
            }
            throw err;
        }
    });
}

export { ValidationError, isValidationError } from "./errors";
export { parseAccountParams, accountParamsSchema, USERNAME_PATTERN } from "./params";
export { resolveAccount, normalizeEnsure, defaultHomeDir, resolveHomeDir } from "./resolver";
export type { ResolvedAccount } from "./resolver";
export { consolidateSSHKeys, legacyKeyName, mappedKeyName } from "./ssh-keys";
export type { ConsolidateSSHKeysInput, ConsolidatedSSHKeys } from "./ssh-keys";
export { planAccount, sshDirPath, resourceIds } from "./planner";
export { emitDescriptors } from "./emitter";
