import logger from "./logger";
import type { Config } from "./config";
import { AptGet, type PackageManager } from "./apt";
import { render, bucketFor, type SourceSet } from "./catalog";
import { detectDistribution, type DistributionIdentity } from "./distro";
import { MirrorSelectionError } from "./errors";
import { HttpGeolocationProbe } from "./geolocation";
import { scanSourceState } from "./inspect";
import { type GeolocationProbe, resolveRegion, type RegionResolution } from "./region";
import { runSpeedTest, type SpeedTestResult } from "./speed";
import { type BackupRecord, SourcesTransaction } from "./transaction";
import { dumpSourceState, verifyMirrorUsage } from "./debug";

export type SelectOptions = {
    config: Config,
    probe?: GeolocationProbe,
    packageManager?: PackageManager,
    isPrivileged?: () => boolean,
    now?: () => Date,
};

export type SelectionResult = {
    distro: DistributionIdentity,
    region: RegionResolution,
    sourceSet: SourceSet,
    backup: BackupRecord,
    speedTest?: SpeedTestResult,
};

function runningAsRoot(): boolean {
    return process.getuid?.() === 0;
}

/**
 * Picks the mirrors for the detected region and rewrites the APT sources, restoring the previous ones when the
 * package index refresh fails. Any fatal condition is thrown as a {@link MirrorSelectionError}.
 */
export async function selectMirror(options: SelectOptions): Promise<SelectionResult> {
    const { config } = options;
    const packageManager = options.packageManager ?? new AptGet(config.apt);
    const probe = options.probe ?? new HttpGeolocationProbe(config.geolocation);

    logger.info("Starting mirror auto-selection...");

    if (!(options.isPrivileged ?? runningAsRoot)()) {
        throw new MirrorSelectionError("precondition", "This program must be run as root (use sudo)");
    }

    const distro = await detectDistribution(config.paths);

    if (config.debug) {
        await dumpSourceState("Initial APT sources state", config.paths, packageManager);
    }

    const region = await resolveRegion(config.geolocation.forceCountry, probe, config.geolocation.services);
    logger.info(`Selecting mirrors for ${ region.region }...`);
    logger.info(`Using ${ bucketFor(region.region).label }`);
    const sourceSet = render(region.region, distro);

    const sourceState = await scanSourceState(config.paths, config.aptSourcesEnv);
    const transaction = new SourcesTransaction({
        paths: config.paths,
        packageManager,
        sourceState,
        now: options.now,
    });

    const backup = await transaction.backup();
    await transaction.clean();
    await transaction.write(sourceSet);
    await transaction.verify();

    if (config.debug) {
        await dumpSourceState("APT sources after configuration", config.paths, packageManager);
    }

    await transaction.refresh();
    logger.info("Mirror configuration completed successfully!");

    if (config.debug) {
        await verifyMirrorUsage(packageManager, transaction.stale);
    }

    let speedTest: SpeedTestResult | undefined;
    if (config.speedTest.enabled) {
        speedTest = await runSpeedTest(packageManager, config.speedTest.packageFor(distro.family, distro.codename));
    } else {
        logger.info("Speed testing disabled by DISABLE_SPEED_TEST");
    }

    return { distro, region, sourceSet, backup, speedTest };
}
