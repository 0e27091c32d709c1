import osPath from "path";
import untildify from "untildify";
import _ from "lodash";
import logger from "./logger";
import { getEnv, isEnabled, parseList } from "./env";

export type Paths = {
    sourcesList: string,
    sourcesListDir: string,
    listsDir: string,
    aptConfDir: string,
    aptConfFile: string,
    aptShareDir: string,
    etcDir: string,
    backupDir: string,
    osReleaseFile: string,
    debianVersionFile: string,
}

export type Geolocation = {
    forceCountry?: string,
    services: string[],
    timeoutMs: number,
    retries: number,
}

export type Apt = {
    aptGetBin: string,
    aptCacheBin: string,
    retries: number,
    timeoutSec: number,
}

export type PackageFn = (family: string, codename: string) => string;

export type SpeedTest = {
    enabled: boolean,
    packageFor: PackageFn,
}

export type Config = {
    debug: boolean,
    paths: Paths,
    geolocation: Geolocation,
    apt: Apt,
    speedTest: SpeedTest,
    aptSourcesEnv?: string,
}

export const DEFAULT_GEOLOCATION_SERVICES = [
    "https://ipapi.co/country_code",
    "https://ipinfo.io/country",
    "https://ifconfig.me/country-iso",
];

const DEFAULT_SPEED_TEST_PACKAGES: Record<string, string> = {
    debian: "debian-archive-keyring",
    ubuntu: "ubuntu-keyring",
};

function pathOrDefault(value: string | undefined, defaultValue: string): string {
    const trimmed = value?.trim();
    return trimmed ? untildify(trimmed) : defaultValue;
}

function parseCount(name: string, value: string | undefined, defaultValue: number, minimum = 0): number {
    const trimmed = value?.trim();
    if (!trimmed) {
        return defaultValue;
    }
    const parsed = Number(trimmed);
    if (!Number.isInteger(parsed) || parsed < minimum) {
        logger.warn(`Ignoring invalid ${ name } value '${ value }', using ${ defaultValue }`);
        return defaultValue;
    }
    return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const sourcesList = pathOrDefault(env.APT_SOURCES_LIST, "/etc/apt/sources.list");
    const paths: Paths = {
        sourcesList,
        sourcesListDir: pathOrDefault(env.APT_SOURCES_LIST_DIR, "/etc/apt/sources.list.d"),
        listsDir: pathOrDefault(env.APT_LISTS_DIR, "/var/lib/apt/lists"),
        aptConfDir: pathOrDefault(env.APT_CONF_DIR, "/etc/apt/apt.conf.d"),
        aptConfFile: pathOrDefault(env.APT_CONF_FILE, "/etc/apt/apt.conf"),
        aptShareDir: pathOrDefault(env.APT_SHARE_DIR, "/usr/share/apt"),
        etcDir: pathOrDefault(env.ETC_DIR, "/etc"),
        backupDir: pathOrDefault(env.BACKUP_DIR, osPath.dirname(sourcesList)),
        osReleaseFile: pathOrDefault(env.OS_RELEASE_FILE, "/etc/os-release"),
        debianVersionFile: pathOrDefault(env.DEBIAN_VERSION_FILE, "/etc/debian_version"),
    };

    const services = parseList(env.GEOLOCATION_SERVICES);
    const forceCountry = env.FORCE_COUNTRY?.trim();
    const geolocation: Geolocation = {
        forceCountry: forceCountry ? forceCountry : undefined,
        services: _.isEmpty(services) ? [...DEFAULT_GEOLOCATION_SERVICES] : services,
        timeoutMs: parseCount("GEOLOCATION_TIMEOUT", env.GEOLOCATION_TIMEOUT, 10, 1) * 1000,
        retries: parseCount("GEOLOCATION_RETRIES", env.GEOLOCATION_RETRIES, 2),
    };

    const apt: Apt = {
        aptGetBin: pathOrDefault(env.APT_GET_BIN, "apt-get"),
        aptCacheBin: pathOrDefault(env.APT_CACHE_BIN, "apt-cache"),
        retries: parseCount("APT_RETRIES", env.APT_RETRIES, 2),
        timeoutSec: parseCount("APT_TIMEOUT", env.APT_TIMEOUT, 30, 1),
    };

    return {
        debug: isEnabled(env.DEBUG),
        paths,
        geolocation,
        apt,
        speedTest: {
            enabled: !isEnabled(env.DISABLE_SPEED_TEST),
            packageFor: (family, codename) =>
                getEnv(env, "SPEED_TEST_PACKAGE", family, codename)?.trim() ||
                (DEFAULT_SPEED_TEST_PACKAGES[family] ?? DEFAULT_SPEED_TEST_PACKAGES.debian),
        },
        aptSourcesEnv: env.APT_SOURCES ? env.APT_SOURCES : undefined,
    };
}
