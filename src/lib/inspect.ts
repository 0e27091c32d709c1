import osPath from "path";
import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import { glob } from "glob";
import _ from "lodash";
import logger from "./logger";
import type { Paths } from "./config";
import { isDirectory, listFiles, readTextIfExists } from "./fs";
import { extractHostnames } from "./sources";

export type LocationKind = "primary" | "dropins" | "backup-save" | "index" | "share" | "config";

export type SourceLocation = {
    path: string,
    kind: LocationKind,
    directory: boolean,
    entries: string[],
};

export type SourceState = {
    /** Candidate locations that currently exist */
    locations: SourceLocation[],
    /** Drop-in file names, relative to the drop-in directory */
    dropins: string[],
    /** Files outside the primary locations that reference a well-known mirror */
    mirrorReferences: string[],
    /** Config fragments setting proxies or unauthenticated access */
    proxyConfigs: string[],
    /** Source files shipped under the vendor apt directory */
    vendorSources: string[],
    /** Mirror hostnames configured by the primary file and drop-ins */
    hostnames: string[],
    aptSourcesEnv: boolean,
};

export const DROPIN_PATTERNS = ["*.list", "*.save", "*.conf", "*.sources"];

export const VENDOR_SOURCE_PATTERNS = ["**/*.list", "**/sources*", "**/*.sources"];

const SCAN_PATTERNS = ["**/*.list", "**/*.conf", "**/sources*", "**/*.sources"];
const SCAN_MAX_DEPTH = 4;
const KNOWN_MIRROR_PATTERN = /deb\.debian\.org|archive\.ubuntu\.com/;
const PROXY_PATTERN = /Acquire::http::Proxy|Acquire::https::Proxy|APT::Get::AllowUnauthenticated/;

export function auxiliaryConfigFiles(paths: Paths): string[] {
    return [
        osPath.join(paths.aptConfDir, "99mirrors"),
        osPath.join(paths.aptConfDir, "99default-release"),
    ];
}

function candidateLocations(paths: Paths): { path: string, kind: LocationKind }[] {
    return [
        { path: paths.sourcesList, kind: "primary" },
        { path: paths.sourcesListDir, kind: "dropins" },
        { path: `${ paths.sourcesList }.save`, kind: "backup-save" },
        { path: `${ paths.sourcesListDir }.save`, kind: "backup-save" },
        { path: paths.listsDir, kind: "index" },
        { path: paths.aptShareDir, kind: "share" },
        { path: paths.aptConfDir, kind: "config" },
        { path: paths.aptConfFile, kind: "config" },
        ...auxiliaryConfigFiles(paths).map((path) => ({ path, kind: "config" as const })),
    ];
}

async function fileMatches(file: string, pattern: RegExp): Promise<boolean> {
    try {
        return pattern.test(await fs.readFile(file, "utf8"));
    } catch (err) {
        logger.debug(`Unable to read ${ file }`, { err });
        return false;
    }
}

async function findMirrorReferences(etcDir: string): Promise<string[]> {
    if (!await isDirectory(etcDir)) {
        return [];
    }
    const candidates = await glob(SCAN_PATTERNS, {
        cwd: etcDir,
        nodir: true,
        dot: true,
        posix: true,
        maxDepth: SCAN_MAX_DEPTH,
    });
    const result: string[] = [];
    for (const candidate of candidates.sort()) {
        const file = osPath.join(etcDir, candidate);
        if (/apt|sources/.test(candidate) && await fileMatches(file, KNOWN_MIRROR_PATTERN)) {
            result.push(file);
        }
    }
    return result;
}

async function findProxyConfigs(aptConfDir: string): Promise<string[]> {
    const result: string[] = [];
    for (const file of await listFiles(aptConfDir)) {
        const path = osPath.join(aptConfDir, file);
        if (await fileMatches(path, PROXY_PATTERN)) {
            result.push(path);
        }
    }
    return result;
}

async function configuredHostnames(paths: Paths, dropins: string[]): Promise<string[]> {
    const hostnames = new Set<string>();
    const files = [paths.sourcesList, ...dropins.map((dropin) => osPath.join(paths.sourcesListDir, dropin))];
    for (const file of files) {
        const content = await readTextIfExists(file);
        if (content) {
            extractHostnames(content).forEach((hostname) => hostnames.add(hostname));
        }
    }
    return [...hostnames].sort();
}

/**
 * Reports every location currently shaping package-source resolution. Never modifies anything.
 */
export async function scanSourceState(paths: Paths, aptSourcesEnv?: string): Promise<SourceState> {
    logger.info("Searching for all APT sources locations...");

    const locations: SourceLocation[] = [];
    for (const candidate of candidateLocations(paths)) {
        if (!await fsExtra.pathExists(candidate.path)) {
            continue;
        }
        const directory = await isDirectory(candidate.path);
        const entries = directory ? await listFiles(candidate.path) : [];
        logger.info(`Found: ${ candidate.path }`);
        for (const entry of entries) {
            logger.debug(`  - ${ osPath.join(candidate.path, entry) }`);
        }
        locations.push({ ...candidate, directory, entries });
    }

    const dropins = await listFiles(paths.sourcesListDir);

    logger.info("Searching for files containing mirror references...");
    const mirrorReferences = await findMirrorReferences(paths.etcDir);
    for (const file of mirrorReferences) {
        logger.info(`Found mirror reference in: ${ file }`);
    }

    const proxyConfigs = await findProxyConfigs(paths.aptConfDir);
    for (const file of proxyConfigs) {
        logger.info(`Found APT config file: ${ file }`);
    }

    const vendorSources = (await listFiles(paths.aptShareDir, VENDOR_SOURCE_PATTERNS))
        .map((file) => osPath.join(paths.aptShareDir, file));
    for (const file of vendorSources) {
        logger.info(`Found source in ${ paths.aptShareDir }: ${ file }`);
    }

    if (aptSourcesEnv) {
        logger.info("Found APT_SOURCES environment variable");
    }

    const hostnames = await configuredHostnames(paths, dropins);
    if (!_.isEmpty(hostnames)) {
        logger.info(`Configured mirrors: ${ hostnames.join(", ") }`);
    }

    return {
        locations,
        dropins,
        mirrorReferences,
        proxyConfigs,
        vendorSources,
        hostnames,
        aptSourcesEnv: !!aptSourcesEnv,
    };
}
