import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import logger from "./logger";
import type { Paths } from "./config";
import { MirrorSelectionError } from "./errors";

export type DistroFamily = "debian" | "ubuntu";

export const DISTRO_FAMILIES: readonly DistroFamily[] = ["debian", "ubuntu"];

export type DistributionIdentity = {
    family: DistroFamily,
    version: string,
    codename: string,
};

const DEBIAN_CODENAMES: Record<string, string> = {
    "13": "trixie",
    "12": "bookworm",
    "11": "bullseye",
    "10": "buster",
};

const DEFAULT_DEBIAN_CODENAME = "bookworm";

export function isDistroFamily(value: string | undefined): value is DistroFamily {
    return DISTRO_FAMILIES.some((family) => family === value);
}

function unquote(value: string): string {
    const match = value.match(/^(["'])(.*)\1$/);
    return match ? match[2] : value;
}

/**
 * Parses the shell-style `KEY=value` pairs of an os-release file.
 */
export function parseOsRelease(content: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith("#")) {
            continue;
        }
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
        if (match) {
            result[match[1]] = unquote(match[2].trim());
        }
    }
    return result;
}

export function debianCodenameForVersion(version: string): string {
    const major = version.trim().split(".")[0];
    if (DEBIAN_CODENAMES[major]) {
        return DEBIAN_CODENAMES[major];
    }
    // Testing and unstable carry the codename instead of a number, e.g. "trixie/sid"
    const named = version.trim().split("/")[0];
    if (Object.values(DEBIAN_CODENAMES).includes(named)) {
        return named;
    }
    return DEFAULT_DEBIAN_CODENAME;
}

function familyFromOsRelease(values: Record<string, string>): string | undefined {
    const id = values.ID?.toLowerCase();
    if (isDistroFamily(id)) {
        return id;
    }
    const like = (values.ID_LIKE ?? "").toLowerCase().split(/\s+/).filter(Boolean);
    return like.find((candidate) => isDistroFamily(candidate)) ?? id;
}

export function identityFromOsRelease(values: Record<string, string>): DistributionIdentity {
    const family = familyFromOsRelease(values);
    if (!isDistroFamily(family)) {
        throw new MirrorSelectionError("unsupported",
            `Unsupported distribution '${ values.ID ?? "<unknown>" }', only ${ DISTRO_FAMILIES.join(" and ") } are supported`);
    }
    // Derivatives name their own release in VERSION_CODENAME, the archive codename is in UBUNTU_CODENAME
    const codename = (family === "ubuntu" ? values.UBUNTU_CODENAME : undefined) || values.VERSION_CODENAME ||
        (family === "debian" && values.VERSION_ID ? debianCodenameForVersion(values.VERSION_ID) : "");
    if (!codename) {
        throw new MirrorSelectionError("precondition", `Unable to determine the release codename of ${ family }`);
    }
    return {
        family,
        version: values.VERSION_ID ?? "",
        codename,
    };
}

export async function detectDistribution(paths: Pick<Paths, "osReleaseFile" | "debianVersionFile">): Promise<DistributionIdentity> {
    let identity: DistributionIdentity;
    if (await fsExtra.pathExists(paths.osReleaseFile)) {
        const content = await fs.readFile(paths.osReleaseFile, "utf8");
        identity = identityFromOsRelease(parseOsRelease(content));
    } else if (await fsExtra.pathExists(paths.debianVersionFile)) {
        const version = (await fs.readFile(paths.debianVersionFile, "utf8")).trim();
        identity = {
            family: "debian",
            version,
            codename: debianCodenameForVersion(version),
        };
    } else {
        throw new MirrorSelectionError("precondition", "Unable to detect distribution");
    }

    logger.info(`Detected: ${ identity.family } ${ identity.version } (${ identity.codename })`);
    return identity;
}
