/**
 * Shared account types for Accountsmith
 *
 * These interfaces are used across multiple packages (host, cli)
 * and are kept here to avoid circular dependencies.
 */

/**
 * Target state of a resource
 */
export type Ensure = "present" | "absent";

/**
 * Resource kinds produced for one account
 */
export type ResourceKind = "group" | "user" | "homeDir" | "sshDir" | "sshKey";

/**
 * One authorized-key entry as supplied in the `ssh_keys` mapping
 */
export interface SSHKeyParam {
    /** Key type, e.g. "ssh-ed25519" (defaults to "ssh-rsa") */
    type?: string;
    /** Base64 key material */
    key?: string;
}

/**
 * Input parameters for one account, after shape validation.
 * Every field except username is optional; defaults are applied by the resolver.
 */
export interface AccountParams {
    username: string;
    uid?: number;
    password?: string;
    shell?: string;
    manage_home?: boolean;
    home_dir?: string;
    home_dir_perms?: string;
    create_group?: boolean;
    groups?: string[];
    system?: boolean;
    /** @deprecated Use ssh_keys */
    ssh_key?: string;
    /** @deprecated Use ssh_keys */
    ssh_key_type?: string;
    ssh_keys?: Record<string, SSHKeyParam>;
    ensure?: string;
    comment?: string;
    gid?: string;
    allowdupe?: boolean;
}

/**
 * Fully-resolved, defaulted description of one desired account
 */
export interface AccountSpec {
    readonly username: string;
    readonly uid?: number;
    readonly password: string;
    readonly shell: string;
    /** Whether useradd should create the home and copy skeleton files */
    readonly manageHome: boolean;
    readonly homeDirPerms: string;
    readonly createGroup: boolean;
    readonly system: boolean;
    /** Supplementary groups, duplicates removed */
    readonly groups: readonly string[];
    readonly ensure: Ensure;
    readonly comment: string;
    /** Only meaningful when createGroup is false */
    readonly gid: string;
    readonly allowDuplicateUid: boolean;
    /** username when createGroup, gid otherwise */
    readonly primaryGroup: string;
    /** Absolute home directory path */
    readonly homeDir: string;
}

/**
 * Canonical authorized-key entry
 */
export interface SSHKeyEntry {
    readonly name: string;
    readonly type: string;
    readonly key: string;
    readonly owner: string;
    readonly ensure: Ensure;
}

/**
 * Non-fatal diagnostic produced while resolving an account
 */
export interface Warning {
    code: "deprecated-parameter";
    /** Parameter the warning is about */
    parameter: string;
    message: string;
}

// ============================================================================
// Resource operations
// ============================================================================

export interface GroupPayload {
    name: string;
    gid?: number;
    isSystem: boolean;
}

export interface UserPayload {
    name: string;
    uid?: number;
    primaryGroup: string;
    supplementaryGroups: readonly string[];
    shell: string;
    comment: string;
    password: string;
    home: string;
    manageHomeCopy: boolean;
    isSystem: boolean;
    allowDuplicateUid: boolean;
}

export interface DirectoryPayload {
    path: string;
    /** Unset on removal */
    owner?: string;
    group?: string;
    mode?: string;
}

export interface SSHKeyPayload {
    name: string;
    owner: string;
    type: string;
    key: string;
}

interface OpBase<K extends ResourceKind, P> {
    readonly kind: K;
    /** Stable identity derived from names and paths only */
    readonly id: string;
    readonly ensure: Ensure;
    /** Ordering class; ops with equal rank are mutually unordered */
    readonly rank: number;
    readonly payload: Readonly<P>;
}

export type GroupOp = OpBase<"group", GroupPayload>;
export type UserOp = OpBase<"user", UserPayload>;
export type HomeDirOp = OpBase<"homeDir", DirectoryPayload>;
export type SSHDirOp = OpBase<"sshDir", DirectoryPayload>;
export type SSHKeyOp = OpBase<"sshKey", SSHKeyPayload>;

export type ResourceOp = GroupOp | UserOp | HomeDirOp | SSHDirOp | SSHKeyOp;

// ============================================================================
// Resource descriptors (handed to the convergence engine)
// ============================================================================

interface DescriptorBase {
    /** Identity other descriptors refer to in `requires` */
    readonly id: string;
    readonly ensure: Ensure;
    /** Descriptors that must be applied before this one */
    readonly requires: readonly string[];
}

export interface GroupDescriptor extends DescriptorBase, Readonly<GroupPayload> {
    readonly kind: "group";
}

export interface UserDescriptor extends DescriptorBase, Readonly<UserPayload> {
    readonly kind: "user";
}

export interface DirectoryDescriptor extends DescriptorBase, Readonly<DirectoryPayload> {
    readonly kind: "directory";
    readonly role: "home" | "ssh";
}

export interface SSHKeyDescriptor extends DescriptorBase, Readonly<SSHKeyPayload> {
    readonly kind: "sshKey";
}

export type ResourceDescriptor =
    | GroupDescriptor
    | UserDescriptor
    | DirectoryDescriptor
    | SSHKeyDescriptor;

/**
 * Everything computed for one provisioning request
 */
export interface AccountPlan {
    spec: AccountSpec;
    sshKeys: readonly SSHKeyEntry[];
    operations: readonly ResourceOp[];
    descriptors: readonly ResourceDescriptor[];
    warnings: readonly Warning[];
}

/**
 * Accounts file / Pulumi config shape: request identifier to raw parameters
 */
export type AccountsInput = Record<string, unknown>;

export const DEFAULT_SHELL = "/bin/bash";
export const DEFAULT_PASSWORD = "!!";
export const DEFAULT_HOME_DIR_PERMS = "0750";
export const DEFAULT_GID = "users";
export const DEFAULT_SSH_KEY_TYPE = "ssh-rsa";
export const SSH_DIR_MODE = "0700";
