/**
 * Shape validation for raw account parameters
 *
 * Raw parameters come from Pulumi config or an accounts JSON file, so their
 * types are checked here before any defaulting happens.
 */

import { z } from "zod";
import type { AccountParams } from "../types";
import { ValidationError } from "./errors";

// POSIX portable account names; also keeps "/" and ".." out of derived home paths
export const USERNAME_PATTERN = /^[a-z_][a-z0-9_.-]*\$?$/i;

const sshKeyParamSchema = z
    .object({
        type: z.string().optional(),
        key: z.string().optional(),
    })
    .strict();

// JSON and Pulumi config both tend to hand numeric ids over as strings
const uidSchema = z.union([
    z.number().int().nonnegative(),
    z
        .string()
        .regex(/^\d+$/, "Expected a non-negative integer")
        .transform((value) => Number.parseInt(value, 10)),
]);

const gidSchema = z.union([
    z.string().trim().min(1),
    z
        .number()
        .int()
        .nonnegative()
        .transform((value) => String(value)),
]);

export const accountParamsSchema = z
    .object({
        username: z
            .string()
            .trim()
            .regex(USERNAME_PATTERN, "Expected a POSIX account name such as \"alice\" or \"svc_backup\"")
            .optional(),
        uid: uidSchema.optional(),
        password: z.string().optional(),
        shell: z.string().trim().min(1).optional(),
        manage_home: z.boolean().optional(),
        home_dir: z.string().trim().min(1).optional(),
        home_dir_perms: z.string().trim().optional(),
        create_group: z.boolean().optional(),
        groups: z.array(z.string().trim().min(1)).optional(),
        system: z.boolean().optional(),
        ssh_key: z.string().optional(),
        ssh_key_type: z.string().optional(),
        ssh_keys: z.record(sshKeyParamSchema).optional(),
        ensure: z.string().optional(),
        comment: z.string().optional(),
        gid: gidSchema.optional(),
        allowdupe: z.boolean().optional(),
    })
    .strict();

function toValidationError(error: z.ZodError): ValidationError {
    const [issue] = error.issues;
    if (issue === undefined) {
        return new ValidationError("(root)", "Invalid account parameters");
    }
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
        const field = issue.keys[0] ?? "(root)";
        return new ValidationError(field, `Unknown account parameter: ${issue.keys.join(", ")}`);
    }
    const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return new ValidationError(field, `${field}: ${issue.message}`);
}

/**
 * Validates raw parameters for one account.
 * `username` falls back to the request identifier when omitted.
 */
export function parseAccountParams(raw: unknown, requestId?: string): AccountParams {
    const result = accountParamsSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw toValidationError(result.error);
    }

    const username = result.data.username ?? requestId?.trim();
    if (!username) {
        throw new ValidationError("username", "username is required when no request identifier is given");
    }
    if (!USERNAME_PATTERN.test(username)) {
        throw new ValidationError(
            "username",
            `username: Expected a POSIX account name such as "alice" or "svc_backup", got "${username}"`
        );
    }

    return { ...result.data, username };
}
