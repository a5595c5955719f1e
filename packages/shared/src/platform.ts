/**
 * Platform Detection Utilities
 *
 * Provides platform and OS-family detection. The OS family is the only
 * host fact the account resolver consumes (for home directory defaults).
 */

import * as fs from "node:fs";

/**
 * Supported platforms
 */
export type Platform = "linux" | "darwin" | "sunos" | "win32";

/**
 * Detects the current platform
 */
export function detectPlatform(): Platform {
    const platform = process.platform;
    switch (platform) {
        case "linux":
        case "darwin":
        case "sunos":
        case "win32":
            return platform;
        default:
            throw new Error(`Unsupported platform: ${platform}`);
    }
}

/**
 * Returns true if running on Linux
 */
export function isLinux(): boolean {
    return process.platform === "linux";
}

/**
 * Returns true if running on macOS
 */
export function isMacOS(): boolean {
    return process.platform === "darwin";
}

/**
 * Returns true if running on Solaris / illumos
 */
export function isSolaris(): boolean {
    return process.platform === "sunos";
}

/**
 * Returns a human-readable display name for the platform
 */
export function getPlatformDisplayName(platform?: Platform): string {
    const p = platform ?? detectPlatform();
    switch (p) {
        case "linux":
            return "Linux";
        case "darwin":
            return "macOS";
        case "sunos":
            return "Solaris";
        case "win32":
            return "Windows";
        default:
            return `Unknown (${p})`;
    }
}

/**
 * Parses /etc/os-release content into key-value pairs
 */
export function parseOsRelease(content: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const line of content.split("\n")) {
        const match = /^([A-Z_]+)=(.*)$/.exec(line.trim());
        if (match?.[1] !== undefined && match[2] !== undefined) {
            result[match[1]] = match[2].replace(/^["']|["']$/g, "");
        }
    }
    return result;
}

/**
 * Maps os-release ID / ID_LIKE fields to an OS family name
 */
export function osFamilyFromOsRelease(osRelease: Record<string, string>): string {
    const ids = [osRelease.ID ?? "", ...(osRelease.ID_LIKE ?? "").split(/\s+/)].map((id) =>
        id.toLowerCase()
    );

    if (ids.some((id) => id === "debian" || id === "ubuntu")) return "Debian";
    if (ids.some((id) => ["rhel", "fedora", "centos", "rocky", "almalinux"].includes(id))) {
        return "RedHat";
    }
    if (ids.some((id) => id === "suse" || id.startsWith("opensuse") || id === "sles")) {
        return "Suse";
    }
    if (ids.includes("arch")) return "Archlinux";
    return "Linux";
}

/**
 * Detects the operating-system family of the current host
 *
 * - Solaris / illumos: "Solaris"
 * - macOS: "Darwin"
 * - Linux: derived from /etc/os-release, "Linux" when unreadable or unknown
 * - any other platform (freebsd, aix, ...): "Unix"
 */
export function detectOsFamily(): string {
    switch (process.platform) {
        case "sunos":
            return "Solaris";
        case "darwin":
            return "Darwin";
        case "win32":
            return "Windows";
        case "linux": {
            if (!fs.existsSync("/etc/os-release")) {
                return "Linux";
            }
            return osFamilyFromOsRelease(parseOsRelease(fs.readFileSync("/etc/os-release", "utf-8")));
        }
        default:
            return "Unix";
    }
}

/**
 * Checks if the current platform is supported for deployment
 */
export function isSupportedPlatform(): boolean {
    return isLinux() || isMacOS() || isSolaris();
}

/**
 * Throws an error if the platform is not supported
 */
export function assertSupportedPlatform(): void {
    if (!isSupportedPlatform()) {
        throw new Error(
            `Unsupported platform: ${process.platform}\n` +
                "Accountsmith manages POSIX accounts; run it on Linux, macOS or Solaris."
        );
    }
}

/**
 * Logs a banner indicating the current platform and OS family
 */
export function logPlatformBanner(osFamily: string): void {
    const displayName = getPlatformDisplayName();

    console.log("");
    console.log("================================================================================");
    console.log(`  Accountsmith - Running on ${displayName} (${osFamily} family)`);
    console.log("================================================================================");
    console.log("");
}
