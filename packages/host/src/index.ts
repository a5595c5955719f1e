/**
 * Accountsmith - Pulumi host program
 *
 * Converges the local host's user accounts to the declared state:
 * 1. Load accounts from `accountsmith:accounts`
 * 2. Resolve and plan each account
 * 3. Register one command resource per planned descriptor
 *
 * Run with: pulumi up
 */

import { assertSupportedPlatform, isLinux, logPlatformBanner } from "@accountsmith/shared";
import { getConfig } from "./config/index";
import { provisionAccounts } from "./provision";

assertSupportedPlatform();
if (!isLinux()) {
    throw new Error(
        "The Pulumi applier drives shadow-utils and only runs on Linux. " +
            "Use `accountsmith plan` to preview accounts on other systems."
    );
}

const config = getConfig();
logPlatformBanner(config.osFamily);

const { summaries, failed } = provisionAccounts(config);

if (failed.length > 0) {
    throw new Error(`Invalid account parameters for: ${failed.join(", ")}`);
}

export const accounts = summaries;
