/**
 * Applies an account plan as Pulumi resources
 *
 * One command:local:Command per descriptor. Each descriptor's `requires`
 * becomes `dependsOn`, so Pulumi runs independent descriptors (the key
 * entries of one account) in parallel and `pulumi destroy` tears the
 * account down in reverse order.
 */

import * as pulumi from "@pulumi/pulumi";
import { type AccountPlan, type ResourceDescriptor, sshDirPath } from "@accountsmith/shared";
import { type CommandScripts, runCommand } from "../lib/command";
import { groupScripts } from "./group";
import { PASSWORD_ENV, userScripts } from "./user";
import { directoryScripts } from "./directories";
import { sshKeyScripts } from "./ssh-key";

export interface ApplyAccountPlanOptions {
    /** Provisioning request the plan was built for; prefixes resource names */
    requestId: string;
    /** Resources every descriptor of this account depends on */
    dependsOn?: pulumi.Resource[];
}

export interface ApplyAccountPlanResult {
    /** Pulumi resources in plan order */
    resources: pulumi.Resource[];
    /** Resource created for each descriptor id */
    byDescriptorId: Map<string, pulumi.Resource>;
}

function nameSegment(value: string): string {
    return value.replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^-+|-+$/g, "");
}

/**
 * Pulumi resource name for a descriptor, unique within the stack
 */
export function resourceName(requestId: string, descriptor: ResourceDescriptor): string {
    switch (descriptor.kind) {
        case "group":
            return `${nameSegment(requestId)}-group-${nameSegment(descriptor.name)}`;
        case "user":
            return `${nameSegment(requestId)}-user-${nameSegment(descriptor.name)}`;
        case "directory":
            return `${nameSegment(requestId)}-${descriptor.role}-dir`;
        case "sshKey":
            return `${nameSegment(requestId)}-ssh-key-${nameSegment(descriptor.name)}`;
    }
}

function scriptsFor(descriptor: ResourceDescriptor, plan: AccountPlan): CommandScripts {
    switch (descriptor.kind) {
        case "group":
            return groupScripts(descriptor);
        case "user":
            return userScripts(descriptor);
        case "directory":
            return directoryScripts(descriptor);
        case "sshKey":
            return sshKeyScripts(descriptor, `${sshDirPath(plan.spec.homeDir)}/authorized_keys`);
    }
}

export function applyAccountPlan(
    plan: AccountPlan,
    options: ApplyAccountPlanOptions
): ApplyAccountPlanResult {
    const { requestId, dependsOn = [] } = options;
    const byDescriptorId = new Map<string, pulumi.Resource>();
    const resources: pulumi.Resource[] = [];

    // Descriptors arrive in plan order, so every prerequisite already exists
    for (const descriptor of plan.descriptors) {
        const prerequisites = descriptor.requires.map((id) => {
            const resource = byDescriptorId.get(id);
            if (resource === undefined) {
                throw new Error(`${descriptor.id} requires ${id}, which is not part of the plan`);
            }
            return resource;
        });

        const scripts = scriptsFor(descriptor, plan);
        const resource = runCommand({
            name: resourceName(requestId, descriptor),
            create: scripts.create,
            delete: scripts.delete,
            dependsOn: [...dependsOn, ...prerequisites],
            environment:
                descriptor.kind === "user" && descriptor.ensure === "present"
                    ? { [PASSWORD_ENV]: pulumi.secret(descriptor.password) }
                    : undefined,
        });

        byDescriptorId.set(descriptor.id, resource);
        resources.push(resource);
    }

    return { resources, byDescriptorId };
}
