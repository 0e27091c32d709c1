import os from "os";
import osPath from "path";
import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import logger from "./logger";
import type { PackageManager } from "./apt";

export type SpeedTestResult = {
    packageName: string,
    success: boolean,
    durationMs: number,
};

/**
 * Downloads one small package into a throwaway directory and times it. Never throws.
 */
export async function runSpeedTest(packageManager: PackageManager, packageName: string,
    clock: () => number = Date.now): Promise<SpeedTestResult> {
    logger.info("Testing mirror speed...");

    const start = clock();
    let success = false;
    let workDir: string | undefined;
    try {
        workDir = await fs.mkdtemp(osPath.join(os.tmpdir(), "apt-mirror-speed-"));
        success = (await packageManager.download(packageName, workDir)).result === "success";
    } catch (err) {
        logger.debug("Speed test download failed", { err });
    } finally {
        if (workDir) {
            await fsExtra.remove(workDir).catch((err: unknown) => logger.debug(`Unable to remove ${ workDir }`, { err }));
        }
    }
    const durationMs = clock() - start;

    if (success) {
        logger.info(`Mirror test completed in ${ (durationMs / 1000).toFixed(1) }s`);
    } else {
        logger.warn("Mirror speed test failed (this is normal for some mirrors)");
    }
    return { packageName, success, durationMs };
}
