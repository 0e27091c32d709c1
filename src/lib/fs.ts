import osPath from "path";
import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import { glob } from "glob";
import logger from "./logger";

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/**
 * Local time as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
    return `${ date.getFullYear() }${ pad(date.getMonth() + 1) }${ pad(date.getDate()) }_` +
        `${ pad(date.getHours()) }${ pad(date.getMinutes()) }${ pad(date.getSeconds()) }`;
}

export async function isDirectory(path: string): Promise<boolean> {
    try {
        return (await fs.stat(path)).isDirectory();
    } catch {
        return false;
    }
}

export async function isFile(path: string): Promise<boolean> {
    try {
        return (await fs.stat(path)).isFile();
    } catch {
        return false;
    }
}

export async function readTextIfExists(path: string): Promise<string | undefined> {
    if (!await isFile(path)) {
        return undefined;
    }
    return await fs.readFile(path, "utf8");
}

/**
 * Lists regular files directly inside a directory, sorted by name. A missing directory has no files.
 */
export async function listFiles(dir: string, patterns: string | string[] = "*"): Promise<string[]> {
    if (!await isDirectory(dir)) {
        return [];
    }
    const files = await glob(patterns, { cwd: dir, nodir: true, dot: true, posix: true });
    return files.sort();
}

export async function copyFiles(src: string, dest: string, files: string[]): Promise<void> {
    await fsExtra.ensureDir(dest);
    for (const file of files) {
        await fs.copyFile(osPath.join(src, file), osPath.join(dest, file));
    }
}

/**
 * Removes a path, logging and swallowing failures. A missing path counts as removed.
 */
export async function removeBestEffort(path: string): Promise<boolean> {
    try {
        if (await fsExtra.pathExists(path)) {
            logger.info(`Removing: ${ path }`);
            await fsExtra.remove(path);
        }
        return true;
    } catch (err) {
        logger.warn(`Unable to remove ${ path }, skipping`, { err });
        return false;
    }
}

export async function removeRequired(path: string): Promise<void> {
    try {
        await fsExtra.remove(path);
    } catch (err: unknown) {
        throw new Error(`Error removing ${ path }`, { cause: err });
    }
}

/**
 * Expands glob patterns inside a directory, returning the matches joined with the directory. Only files match
 * unless `nodir` is turned off.
 */
export async function expand(dir: string, patterns: string | string[], { nodir = true } = {}): Promise<string[]> {
    if (!await isDirectory(dir)) {
        return [];
    }
    const matches = await glob(patterns, { cwd: dir, nodir, dot: true, posix: true });
    return matches.sort().map((match) => osPath.join(dir, match));
}
