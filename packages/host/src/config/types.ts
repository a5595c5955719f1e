/**
 * Configuration types for the Accountsmith host program
 */

import type { AccountsInput } from "@accountsmith/shared";

// Re-export shared types so consumers in host can import from config/types
export type {
    AccountsInput,
    AccountPlan,
    AccountSpec,
    ResourceDescriptor,
    Warning,
} from "@accountsmith/shared";

/** Pulumi config namespace */
export const CONFIG_NAMESPACE = "accountsmith";

/**
 * Host program configuration
 */
export interface HostConfig {
    /** Request identifier to raw account parameters */
    accounts: AccountsInput;
    /** OS family used for home directory defaults */
    osFamily: string;
}

/**
 * Stack output for one provisioned account
 */
export interface AccountSummary {
    username: string;
    homeDir: string;
    ensure: string;
    /** Descriptor ids in plan order */
    descriptors: string[];
}
