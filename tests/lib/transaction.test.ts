import fs from "node:fs/promises";
import fsExtra from "fs-extra";
import type { Paths } from "../../src/lib/config";
import { render } from "../../src/lib/catalog";
import { scanSourceState } from "../../src/lib/inspect";
import { formatSourceList } from "../../src/lib/sources";
import { SourcesTransaction } from "../../src/lib/transaction";
import { actionResult, FakePackageManager } from "../mocks";
import { createFiles, createTestConfig, withLocalTmpDir } from "../utils";

const OLD_PRIMARY = "deb http://ftp.old-mirror.test/debian bookworm main\n";
const OLD_DROPIN = "deb http://extra.test/repo stable main\n";
const NOW = new Date(2024, 0, 2, 3, 4, 5);
const PRIMARY_BACKUP = "etc/apt/sources.list.backup.20240102_030405";
const DROPINS_BACKUP = "etc/apt/sources.list.d.backup.20240102_030405";

const sourceSet = render("CN", { family: "debian", version: "12", codename: "bookworm" });

async function createTransaction(paths: Paths, packageManager = new FakePackageManager()) {
    const sourceState = await scanSourceState(paths);
    return new SourcesTransaction({ paths, packageManager, sourceState, now: () => NOW });
}

/**
 * Makes `fsExtra.remove` fail for one path while removing everything else.
 */
function failRemovalOf(failing: string) {
    const remove = fsExtra.remove;
    return jest.spyOn(fsExtra, "remove").mockImplementation(async (path: string) => {
        if (path === failing) {
            throw Object.assign(new Error(`EBUSY: resource busy or locked, rmdir '${ path }'`), { code: "EBUSY" });
        }
        await remove(path);
    });
}

afterEach(() => {
    jest.restoreAllMocks();
});

async function createExistingSources() {
    await createFiles({
        "etc/apt/sources.list": OLD_PRIMARY,
        "etc/apt/sources.list.d/extra.list": OLD_DROPIN,
        "etc/apt/sources.list.save": OLD_PRIMARY,
        "etc/apt/apt.conf.d/99mirrors": "Acquire::Retries \"3\";\n",
        "etc/apt/apt.conf.d/20auto-upgrades": "APT::Periodic::Update-Package-Lists \"1\";\n",
        "var/lib/apt/lists/deb.debian.org_debian_dists_bookworm_InRelease": "index",
        "var/lib/apt/lists/partial": undefined,
        "usr/share/apt/default/sources.list": OLD_PRIMARY,
    });
}

describe("Test sources transaction", () => {
    test("Check a complete run", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        const transaction = await createTransaction(paths, packageManager);

        const record = await transaction.run(sourceSet);

        expect(transaction.state).toEqual("refreshed");
        expect(packageManager.calls).toEqual(["clean", "update"]);
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(formatSourceList(sourceSet));
        expect(transaction.stale).toEqual(["extra.test", "ftp.old-mirror.test"]);

        expect(record).toEqual({
            timestamp: "20240102_030405",
            primaryBackup: PRIMARY_BACKUP,
            primaryExisted: true,
            dropinsBackupDir: DROPINS_BACKUP,
            dropins: ["extra.list"],
        });
        expect(Object.isFrozen(record)).toBeTrue();
        expect(await fs.readFile(PRIMARY_BACKUP, "utf8")).toEqual(OLD_PRIMARY);
        expect(await fs.readFile(`${ DROPINS_BACKUP }/extra.list`, "utf8")).toEqual(OLD_DROPIN);

        expect("etc/apt/sources.list.d").toPathExist();
        expect("etc/apt/sources.list.d/extra.list").not.toPathExist();
        expect("etc/apt/sources.list.save").not.toPathExist();
        expect("etc/apt/apt.conf.d/99mirrors").not.toPathExist();
        expect("etc/apt/apt.conf.d/20auto-upgrades").toPathExist();
        expect(await fs.readdir("var/lib/apt/lists")).toBeEmpty();
        expect("usr/share/apt/default/sources.list").not.toPathExist();
    }));

    test("Check that a failed refresh restores the previous sources", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        packageManager.results.update = actionResult("script", "E: Failed to fetch\n");
        const transaction = await createTransaction(paths, packageManager);

        await expect(transaction.run(sourceSet)).rejects.toMatchObject({
            kind: "refresh",
            message: "Package index refresh failed, the previous APT sources were restored",
            cause: new Error("E: Failed to fetch"),
        });

        expect(transaction.state).toEqual("rolled-back");
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(OLD_PRIMARY);
        expect(await fs.readFile("etc/apt/sources.list.d/extra.list", "utf8")).toEqual(OLD_DROPIN);
        expect(await transaction.rollback()).toEqual({
            primaryRestored: true,
            restoredDropins: ["extra.list"],
            failedDropins: [],
        });
    }));

    test("Check a first run without any sources", withLocalTmpDir(async () => {
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);

        const record = await transaction.run(sourceSet);

        expect(transaction.state).toEqual("refreshed");
        expect(record.primaryExisted).toBeFalse();
        expect(record.dropins).toBeEmpty();
        expect(await fs.readFile(PRIMARY_BACKUP, "utf8")).toEqual("");
        expect(DROPINS_BACKUP).toPathExist();
        expect(transaction.stale).toBeEmpty();
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(formatSourceList(sourceSet));
    }));

    test("Check that rollback removes a primary file that did not exist", withLocalTmpDir(async () => {
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);
        await transaction.backup();
        await transaction.clean();
        await transaction.write(sourceSet);

        const report = await transaction.rollback();

        expect(report).toEqual({ primaryRestored: true, restoredDropins: [], failedDropins: [] });
        expect("etc/apt/sources.list").not.toPathExist();
        expect(transaction.state).toEqual("rolled-back");
    }));

    test("Check that leftover references fail verification without rollback", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        const transaction = await createTransaction(paths, packageManager);
        await transaction.backup();
        await transaction.clean();
        await transaction.write(sourceSet);
        await fs.appendFile("etc/apt/sources.list", OLD_PRIMARY);

        await expect(transaction.verify()).rejects.toMatchObject({
            kind: "verify",
            message: "Old mirror references found in etc/apt/sources.list: ftp.old-mirror.test",
        });

        expect(transaction.state).toEqual("failed");
        expect(packageManager.calls).toEqual(["clean"]);
        expect(await fs.readFile("etc/apt/sources.list", "utf8"))
            .toEqual(formatSourceList(sourceSet) + OLD_PRIMARY);
        await expect(transaction.refresh()).rejects.toMatchObject({ kind: "state" });
    }));

    test("Check that missing entries fail verification", withLocalTmpDir(async () => {
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);
        await transaction.backup();
        await transaction.clean();
        await transaction.write(sourceSet);
        await fs.writeFile("etc/apt/sources.list", formatSourceList(sourceSet.slice(0, 1)));

        await expect(transaction.verify()).rejects.toMatchObject({
            kind: "verify",
            message: "etc/apt/sources.list is missing 3 of the selected entries",
        });
    }));

    test("Check that an empty primary file fails verification", withLocalTmpDir(async () => {
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);
        await transaction.backup();
        await transaction.clean();
        await transaction.write(sourceSet);
        await fs.writeFile("etc/apt/sources.list", "");

        await expect(transaction.verify()).rejects.toMatchObject({
            kind: "verify",
            message: "Failed to write etc/apt/sources.list",
        });
    }));

    test("Check that an empty source set is refused", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);
        await transaction.backup();
        await transaction.clean();

        await expect(transaction.write([])).rejects.toMatchObject({ kind: "write" });
        expect(transaction.state).toEqual("failed");
        expect("etc/apt/sources.list").not.toPathExist();
    }));

    test("Check that steps run in order", withLocalTmpDir(async () => {
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);

        await expect(transaction.clean()).rejects.toMatchObject({
            kind: "state",
            message: "Transaction step 'clean' is not allowed in state 'idle'",
        });
        await expect(transaction.write(sourceSet)).rejects.toMatchObject({ kind: "state" });
        await expect(transaction.rollback()).rejects.toMatchObject({ kind: "state" });
        expect(transaction.state).toEqual("idle");
        expect("etc/apt/sources.list").not.toPathExist();
    }));

    test("Check that completed steps are not repeated", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        const transaction = await createTransaction(paths, packageManager);

        const first = await transaction.backup();
        await transaction.clean();
        await transaction.clean();

        expect(await transaction.backup()).toBe(first);
        expect(packageManager.calls).toEqual(["clean"]);
        expect(transaction.state).toEqual("cleaned");
    }));

    test("Check that a failed backup stops the run", withLocalTmpDir(async () => {
        await createExistingSources();
        await createFiles({ "blocker": "not a directory" });
        const { paths } = createTestConfig({ BACKUP_DIR: "blocker" });
        const transaction = await createTransaction(paths);

        await expect(transaction.backup()).rejects.toMatchObject({ kind: "backup" });
        expect(transaction.state).toEqual("failed");
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(OLD_PRIMARY);
    }));

    test("Check that a failed removal of the primary file stops the run", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        const transaction = await createTransaction(paths, packageManager);
        await transaction.backup();
        failRemovalOf("etc/apt/sources.list");

        await expect(transaction.clean()).rejects.toMatchObject({
            kind: "clean",
            message: "Unable to remove the existing APT sources, refusing to write over an unknown state",
            cause: new Error("Error removing etc/apt/sources.list"),
        });

        expect(transaction.state).toEqual("failed");
        await expect(transaction.write(sourceSet)).rejects.toMatchObject({ kind: "state" });
        expect(packageManager.calls).toEqual(["clean"]);
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(OLD_PRIMARY);
        expect("etc/apt/sources.list.d/extra.list").not.toPathExist();
        expect(`${ DROPINS_BACKUP }/extra.list`).toPathExist();
    }));

    test("Check that auxiliary removal failures are skipped", withLocalTmpDir(async () => {
        await createExistingSources();
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);
        failRemovalOf("etc/apt/apt.conf.d/99mirrors");

        await transaction.run(sourceSet);

        expect(transaction.state).toEqual("refreshed");
        expect("etc/apt/apt.conf.d/99mirrors").toPathExist();
        expect("etc/apt/sources.list.save").not.toPathExist();
        expect("usr/share/apt/default/sources.list").not.toPathExist();
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(formatSourceList(sourceSet));
    }));

    test("Check that rollback restores every file it can", withLocalTmpDir(async () => {
        await createFiles({
            "etc/apt/sources.list": OLD_PRIMARY,
            "etc/apt/sources.list.d/a.list": "deb http://a.test/repo stable main\n",
            "etc/apt/sources.list.d/b.list": "deb http://b.test/repo stable main\n",
        });
        const { paths } = createTestConfig();
        const packageManager = new FakePackageManager();
        packageManager.results.update = actionResult("script", "E: Failed to fetch\n");
        packageManager.onUpdate = () => fs.rm(`${ DROPINS_BACKUP }/a.list`);
        const transaction = await createTransaction(paths, packageManager);

        await expect(transaction.run(sourceSet)).rejects.toMatchObject({
            kind: "refresh",
            message: "Package index refresh failed and the previous APT sources could not be fully restored",
        });

        expect(await transaction.rollback()).toEqual({
            primaryRestored: true,
            restoredDropins: ["b.list"],
            failedDropins: ["a.list"],
        });
        expect(await fs.readFile("etc/apt/sources.list", "utf8")).toEqual(OLD_PRIMARY);
        expect(await fs.readFile("etc/apt/sources.list.d/b.list", "utf8")).toEqual("deb http://b.test/repo stable main\n");
        expect("etc/apt/sources.list.d/a.list").not.toPathExist();
    }));

    test("Check that directories among the drop-ins are left alone", withLocalTmpDir(async () => {
        await createExistingSources();
        await createFiles({
            "etc/apt/sources.list.d/nested.list/keep.txt": "keep",
        });
        const { paths } = createTestConfig();
        const transaction = await createTransaction(paths);

        const record = await transaction.run(sourceSet);

        expect(record.dropins).toEqual(["extra.list"]);
        expect("etc/apt/sources.list.d/extra.list").not.toPathExist();
        expect("etc/apt/sources.list.d/nested.list/keep.txt").toPathExist();
    }));
});
