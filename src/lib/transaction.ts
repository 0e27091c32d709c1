import osPath from "path";
import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import _ from "lodash";
import logger from "./logger";
import type { Paths } from "./config";
import type { PackageManager } from "./apt";
import type { SourceSet } from "./catalog";
import type { SourceState } from "./inspect";
import { auxiliaryConfigFiles, DROPIN_PATTERNS } from "./inspect";
import { MirrorSelectionError } from "./errors";
import {
    copyFiles,
    expand,
    formatTimestamp,
    isFile,
    listFiles,
    readTextIfExists,
    removeBestEffort,
    removeRequired
} from "./fs";
import { extractHostnames, formatSourceLine, formatSourceList, mentionsHostname, sourceSetHostnames } from "./sources";

export type TransactionState =
    "idle"
    | "backed-up"
    | "cleaned"
    | "written"
    | "verified"
    | "refreshed"
    | "rolled-back"
    | "failed";

export type BackupRecord = Readonly<{
    timestamp: string,
    primaryBackup: string,
    /** `false` when the primary backup is only the empty placeholder */
    primaryExisted: boolean,
    dropinsBackupDir: string,
    dropins: readonly string[],
}>;

export type RollbackReport = {
    primaryRestored: boolean,
    restoredDropins: string[],
    failedDropins: string[],
};

export type TransactionOptions = {
    paths: Paths,
    packageManager: PackageManager,
    /** Source state scanned before any mutation */
    sourceState: SourceState,
    now?: () => Date,
};

const STALE_INDEX_PATTERNS = ["deb.debian.org*", "archive.ubuntu.com*"];

/**
 * Guards a destructive rewrite of the APT sources: backup, clean, write, verify and refresh, restoring the backup
 * when the refresh fails. Every step runs once, repeating a completed step returns without doing anything and
 * running a step out of order throws.
 */
export class SourcesTransaction {
    private readonly paths: Paths;
    private readonly packageManager: PackageManager;
    private readonly sourceState: SourceState;
    private readonly now: () => Date;

    private current: TransactionState = "idle";
    private backupRecord: BackupRecord | undefined;
    private sourceSet: SourceSet | undefined;
    private staleHostnames: string[] = [];
    private rollbackReport: RollbackReport | undefined;

    constructor(options: TransactionOptions) {
        this.paths = options.paths;
        this.packageManager = options.packageManager;
        this.sourceState = options.sourceState;
        this.now = options.now ?? (() => new Date());
    }

    get state(): TransactionState {
        return this.current;
    }

    get backupSet(): BackupRecord | undefined {
        return this.backupRecord;
    }

    /** Hostnames configured before the run that the new source set does not use */
    get stale(): readonly string[] {
        return this.staleHostnames;
    }

    private enter(step: string, from: TransactionState[], to: TransactionState): boolean {
        if (this.current === to) {
            logger.debug(`Transaction step '${ step }' already completed`);
            return false;
        }
        if (!from.includes(this.current)) {
            throw new MirrorSelectionError("state",
                `Transaction step '${ step }' is not allowed in state '${ this.current }'`);
        }
        return true;
    }

    private fail(error: MirrorSelectionError): MirrorSelectionError {
        this.current = "failed";
        return error;
    }

    async backup(): Promise<BackupRecord> {
        if (this.backupRecord) {
            return this.backupRecord;
        }
        this.enter("backup", ["idle"], "backed-up");

        const timestamp = formatTimestamp(this.now());
        const primaryBackup = osPath.join(this.paths.backupDir,
            `${ osPath.basename(this.paths.sourcesList) }.backup.${ timestamp }`);
        const dropinsBackupDir = osPath.join(this.paths.backupDir,
            `${ osPath.basename(this.paths.sourcesListDir) }.backup.${ timestamp }`);

        let record: BackupRecord;
        try {
            await fsExtra.ensureDir(dropinsBackupDir);

            const primaryExisted = await isFile(this.paths.sourcesList);
            if (primaryExisted) {
                await fs.copyFile(this.paths.sourcesList, primaryBackup);
                logger.info(`Backup created: ${ primaryBackup }`);
            } else {
                logger.warn(`No existing ${ this.paths.sourcesList } found, recording an empty backup`);
                await fs.writeFile(primaryBackup, "");
            }

            const dropins = await listFiles(this.paths.sourcesListDir);
            await copyFiles(this.paths.sourcesListDir, dropinsBackupDir, dropins);
            if (dropins.length > 0) {
                logger.info(`Backed up ${ dropins.length } files from ${ this.paths.sourcesListDir } to ${ dropinsBackupDir }`);
            } else {
                logger.info(`No files found in ${ this.paths.sourcesListDir }`);
            }

            record = Object.freeze({
                timestamp,
                primaryBackup,
                primaryExisted,
                dropinsBackupDir,
                dropins: Object.freeze([...dropins]),
            });
        } catch (err) {
            throw this.fail(new MirrorSelectionError("backup", "Unable to back up the current APT sources",
                { cause: err }));
        }

        this.backupRecord = record;
        this.current = "backed-up";
        return record;
    }

    async clean(): Promise<void> {
        if (!this.enter("clean", ["backed-up"], "cleaned")) {
            return;
        }
        logger.info("Thoroughly cleaning APT sources...");

        const cleanResult = await this.packageManager.clean();
        if (cleanResult.result !== "success") {
            logger.warn("Package cache clean failed, continuing");
        }
        for (const path of await expand(this.paths.listsDir, "*", { nodir: false })) {
            await removeBestEffort(path);
        }

        try {
            for (const path of await expand(this.paths.sourcesListDir, DROPIN_PATTERNS)) {
                await removeRequired(path);
            }
            await removeRequired(this.paths.sourcesList);
        } catch (err) {
            throw this.fail(new MirrorSelectionError("clean",
                "Unable to remove the existing APT sources, refusing to write over an unknown state", { cause: err }));
        }

        const auxiliary = [
            `${ this.paths.sourcesList }.save`,
            `${ this.paths.sourcesListDir }.save`,
            ...await expand(this.paths.listsDir, STALE_INDEX_PATTERNS),
            ...auxiliaryConfigFiles(this.paths),
            ...this.sourceState.vendorSources,
        ];
        for (const path of auxiliary) {
            await removeBestEffort(path);
        }

        this.current = "cleaned";
        logger.info("APT sources cleaned");
    }

    async write(sourceSet: SourceSet): Promise<void> {
        if (!this.enter("write", ["cleaned"], "written")) {
            return;
        }
        if (_.isEmpty(sourceSet)) {
            throw this.fail(new MirrorSelectionError("write", "Refusing to write an empty source list"));
        }

        const used = sourceSetHostnames(sourceSet);
        this.staleHostnames = this.sourceState.hostnames.filter((hostname) => !used.has(hostname));

        logger.info(`Writing new ${ this.paths.sourcesList }...`);
        try {
            await fsExtra.ensureDir(osPath.dirname(this.paths.sourcesList));
            await fs.writeFile(this.paths.sourcesList, formatSourceList(sourceSet), "utf8");
        } catch (err) {
            throw this.fail(new MirrorSelectionError("write", `Failed to write ${ this.paths.sourcesList }`,
                { cause: err }));
        }

        this.sourceSet = sourceSet;
        this.current = "written";
    }

    async verify(): Promise<void> {
        if (!this.enter("verify", ["written"], "verified")) {
            return;
        }
        const sourceSet = this.sourceSet;
        if (!sourceSet) {
            throw this.fail(new MirrorSelectionError("state", "Nothing was written to verify"));
        }

        const content = await readTextIfExists(this.paths.sourcesList);
        if (!content) {
            throw this.fail(new MirrorSelectionError("verify", `Failed to write ${ this.paths.sourcesList }`));
        }

        const lines = new Set(content.split(/\r?\n/));
        const missing = sourceSet.map(formatSourceLine).filter((line) => !lines.has(line));
        if (missing.length > 0) {
            throw this.fail(new MirrorSelectionError("verify",
                `${ this.paths.sourcesList } is missing ${ missing.length } of the selected entries`));
        }

        const written = extractHostnames(content);
        const leftovers = this.staleHostnames.filter(
            (hostname) => written.has(hostname) || mentionsHostname(content, hostname));
        if (leftovers.length > 0) {
            throw this.fail(new MirrorSelectionError("verify",
                `Old mirror references found in ${ this.paths.sourcesList }: ${ leftovers.join(", ") }`));
        }

        logger.info(`${ this.paths.sourcesList } written successfully`);
        logger.info("Contents preview:");
        for (const line of content.split("\n").slice(0, 3)) {
            logger.info(`  ${ line }`);
        }
        this.current = "verified";
    }

    async refresh(): Promise<void> {
        if (!this.enter("refresh", ["verified"], "refreshed")) {
            return;
        }
        logger.info("Updating package lists...");

        const result = await this.packageManager.update();
        if (result.result === "success") {
            logger.info("Package lists updated successfully");
            this.current = "refreshed";
            return;
        }

        logger.error("Failed to update package lists, restoring backup...");
        const report = await this.rollback();
        const cause = result.error instanceof Error ?
            result.error :
            new Error(result.message.trim() || `exit code ${ result.error }`);
        const complete = report.primaryRestored && report.failedDropins.length === 0;
        throw new MirrorSelectionError("refresh",
            complete ?
                "Package index refresh failed, the previous APT sources were restored" :
                "Package index refresh failed and the previous APT sources could not be fully restored",
            { cause });
    }

    /**
     * Restores the primary file and every drop-in from this run's backup. Each file is attempted independently.
     */
    async rollback(): Promise<RollbackReport> {
        if (!this.enter("rollback", ["written", "verified", "refreshed"], "rolled-back") && this.rollbackReport) {
            return this.rollbackReport;
        }
        const record = this.backupRecord;
        if (!record) {
            throw this.fail(new MirrorSelectionError("state", "No backup available to restore"));
        }

        const report: RollbackReport = { primaryRestored: false, restoredDropins: [], failedDropins: [] };

        try {
            if (record.primaryExisted) {
                await fs.copyFile(record.primaryBackup, this.paths.sourcesList);
                logger.warn(`Restored ${ this.paths.sourcesList } from ${ record.primaryBackup }`);
            } else {
                await fsExtra.remove(this.paths.sourcesList);
                logger.warn(`Removed ${ this.paths.sourcesList }, there was none before`);
            }
            report.primaryRestored = true;
        } catch (err) {
            logger.error(`Unable to restore ${ this.paths.sourcesList } from ${ record.primaryBackup }`, { err });
        }

        if (record.dropins.length > 0) {
            try {
                await fsExtra.ensureDir(this.paths.sourcesListDir);
            } catch (err) {
                logger.error(`Unable to recreate ${ this.paths.sourcesListDir }`, { err });
            }
        }
        for (const dropin of record.dropins) {
            try {
                await fs.copyFile(osPath.join(record.dropinsBackupDir, dropin),
                    osPath.join(this.paths.sourcesListDir, dropin));
                report.restoredDropins.push(dropin);
            } catch (err) {
                logger.error(`Unable to restore ${ dropin } from ${ record.dropinsBackupDir }`, { err });
                report.failedDropins.push(dropin);
            }
        }
        if (report.restoredDropins.length > 0) {
            logger.warn(`Restored ${ report.restoredDropins.length } files in ${ this.paths.sourcesListDir } from ${
                record.dropinsBackupDir }`);
        }

        this.rollbackReport = report;
        this.current = "rolled-back";
        return report;
    }

    async run(sourceSet: SourceSet): Promise<BackupRecord> {
        const record = await this.backup();
        await this.clean();
        await this.write(sourceSet);
        await this.verify();
        await this.refresh();
        return record;
    }
}
