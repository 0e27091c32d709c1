import osPath from "path";
import logger from "./logger";
import type { Paths } from "./config";
import type { PackageManager } from "./apt";
import { isDirectory, listFiles, readTextIfExists } from "./fs";
import { mentionsHostname } from "./sources";

const POLICY_LINES = 20;

function logContent(content: string) {
    for (const line of content.replace(/\n$/, "").split("\n")) {
        logger.info(line);
    }
}

async function dumpDirectory(dir: string, label: string) {
    for (const file of await listFiles(dir)) {
        const path = osPath.join(dir, file);
        logger.info(`${ label }: ${ path }`);
        logContent(await readTextIfExists(path) ?? "");
        logger.info("---");
    }
}

/**
 * Logs the primary file, drop-ins, config fragments and the head of the package manager's policy.
 */
export async function dumpSourceState(title: string, paths: Paths, packageManager: PackageManager): Promise<void> {
    logger.info(`=== DEBUG: ${ title } ===`);

    logger.info(`=== Current ${ paths.sourcesList } content ===`);
    const primary = await readTextIfExists(paths.sourcesList);
    if (primary !== undefined) {
        logContent(primary);
    } else {
        logger.info(`No ${ paths.sourcesList } file found`);
    }

    logger.info(`=== ${ paths.sourcesListDir } contents ===`);
    if (await isDirectory(paths.sourcesListDir)) {
        await dumpDirectory(paths.sourcesListDir, "File");
    } else {
        logger.info(`No ${ paths.sourcesListDir } directory found`);
    }

    logger.info("=== APT configuration files ===");
    await dumpDirectory(paths.aptConfDir, "Config file");

    logger.info("=== APT sources list (apt-cache policy) ===");
    const policy = await packageManager.policy();
    logContent((policy.output ?? "").split("\n").slice(0, POLICY_LINES).join("\n"));
}

/**
 * Checks whether a debug refresh still talks to hostnames that were replaced.
 */
export async function verifyMirrorUsage(packageManager: PackageManager, staleHostnames: readonly string[]): Promise<boolean> {
    logger.info("Verifying mirror configuration...");
    const result = await packageManager.debugUpdate();
    const output = `${ result.output ?? "" }\n${ result.message }`;
    const stillUsed = staleHostnames.filter((hostname) => mentionsHostname(output, hostname));
    if (stillUsed.length > 0) {
        logger.warn(`Still detecting old mirrors (${ stillUsed.join(", ") }), this might be from cached data`);
        return false;
    }
    logger.info("Only configured mirrors are being used");
    return true;
}
