/// <reference path="../types/with-local-tmp-dir.d.ts" />
import type { TmpDirCallback } from "with-local-tmp-dir";
import { default as withLocalTmpDirFunc } from "with-local-tmp-dir";
import osPath from "path";
import fsExtra from "fs-extra";
import fs from "fs/promises";
import dedent from "dedent";
import { type Config, loadConfig } from "../src/lib/config";

export function withLocalTmpDir<T>(what: TmpDirCallback<T>) {
    return async () => {
        await fsExtra.ensureDir("tmp");
        return withLocalTmpDirFunc({ unsafeCleanup: true, dir: osPath.resolve("tmp") }, what);
    }
}

export async function createFiles(files: Record<string, string | undefined>) {
    for (const [filePath, fileContent] of Object.entries(files)) {
        if (fileContent === undefined) {
            await fsExtra.ensureDir(filePath);
        } else {
            const fileDir = osPath.dirname(filePath);
            if (fileDir.length > 0) {
                await fsExtra.ensureDir(fileDir);
            }
            await fs.writeFile(filePath, fileContent, "utf8");
        }
    }
}

export const TEST_ENV: NodeJS.ProcessEnv = {
    APT_SOURCES_LIST: "etc/apt/sources.list",
    APT_SOURCES_LIST_DIR: "etc/apt/sources.list.d",
    APT_LISTS_DIR: "var/lib/apt/lists",
    APT_CONF_DIR: "etc/apt/apt.conf.d",
    APT_CONF_FILE: "etc/apt/apt.conf",
    APT_SHARE_DIR: "usr/share/apt",
    ETC_DIR: "etc",
    OS_RELEASE_FILE: "etc/os-release",
    DEBIAN_VERSION_FILE: "etc/debian_version",
    DISABLE_SPEED_TEST: "1",
};

/**
 * Configuration rooted in the current working directory.
 */
export function createTestConfig(env: NodeJS.ProcessEnv = {}): Config {
    return loadConfig({ ...TEST_ENV, ...env });
}

export const BOOKWORM_OS_RELEASE = dedent`
    PRETTY_NAME="Debian GNU/Linux 12 (bookworm)"
    NAME="Debian GNU/Linux"
    VERSION_ID="12"
    VERSION="12 (bookworm)"
    VERSION_CODENAME=bookworm
    ID=debian
`;

export const JAMMY_OS_RELEASE = dedent`
    PRETTY_NAME="Ubuntu 22.04.4 LTS"
    NAME="Ubuntu"
    VERSION_ID="22.04"
    VERSION="22.04.4 LTS (Jammy Jellyfish)"
    VERSION_CODENAME=jammy
    ID=ubuntu
    ID_LIKE=debian
    UBUNTU_CODENAME=jammy
`;
