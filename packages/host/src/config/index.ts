/**
 * Configuration loader for Accountsmith
 * Loads configuration from Pulumi config with validation
 */

import * as pulumi from "@pulumi/pulumi";
import { detectOsFamily, type AccountsInput } from "@accountsmith/shared";
import { CONFIG_NAMESPACE, type HostConfig } from "./types";

function isAccountsInput(value: unknown): value is AccountsInput {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads the host configuration from `accountsmith:*` Pulumi config keys.
 *
 * - accountsmith:accounts (required) - object of request id to account parameters
 * - accountsmith:os-family (optional) - overrides OS family detection
 */
export function getConfig(): HostConfig {
    const config = new pulumi.Config(CONFIG_NAMESPACE);

    const accounts = config.requireObject<unknown>("accounts");
    if (!isAccountsInput(accounts)) {
        throw new Error(
            `${CONFIG_NAMESPACE}:accounts must be an object mapping request ids to account parameters`
        );
    }

    return {
        accounts,
        osFamily: config.get("os-family") ?? detectOsFamily(),
    };
}

export * from "./types";
