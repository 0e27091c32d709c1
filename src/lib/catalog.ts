import type { DistroFamily, DistributionIdentity } from "./distro";
import { MirrorSelectionError } from "./errors";

export type SuiteSuffix = "" | "-updates" | "-backports" | "-security";

/**
 * One `deb` line of the primary source file.
 */
export type MirrorEntry = {
    uri: string,
    suite: string,
    suffix: SuiteSuffix,
    components: readonly string[],
};

export type SourceSet = readonly MirrorEntry[];

type FamilyMirror = {
    /** Archive holding the base, updates and backports suites */
    archive: string,
    /** Archive holding the security suite, the distribution's canonical one unless the bucket has its own */
    security?: string,
};

export type RegionBucket = {
    name: string,
    label: string,
    regions: readonly string[],
    mirrors: Record<DistroFamily, FamilyMirror>,
};

export const SUITE_SUFFIXES: readonly SuiteSuffix[] = ["", "-updates", "-backports", "-security"];

export const FAMILY_COMPONENTS: Record<DistroFamily, readonly string[]> = {
    debian: ["main", "contrib", "non-free", "non-free-firmware"],
    ubuntu: ["main", "restricted", "universe", "multiverse"],
};

const DEBIAN_SECURITY = "https://security.debian.org/debian-security";

export const REGION_BUCKETS: readonly RegionBucket[] = [
    {
        name: "china",
        label: "Chinese mirrors (Tsinghua University)",
        regions: ["CN", "HK", "TW", "MO"],
        mirrors: {
            debian: {
                archive: "https://mirrors.tuna.tsinghua.edu.cn/debian/",
                security: "https://mirrors.tuna.tsinghua.edu.cn/debian-security",
            },
            ubuntu: { archive: "https://mirrors.tuna.tsinghua.edu.cn/ubuntu/" },
        },
    },
    {
        name: "japan-korea",
        label: "Japanese mirrors",
        regions: ["JP", "KR"],
        mirrors: {
            debian: { archive: "https://ftp.jp.debian.org/debian/" },
            ubuntu: { archive: "https://jp.archive.ubuntu.com/ubuntu/" },
        },
    },
    {
        name: "southeast-asia",
        label: "Singapore mirrors",
        regions: ["SG", "MY", "TH", "VN", "ID", "PH"],
        mirrors: {
            debian: { archive: "https://ftp.sg.debian.org/debian/" },
            ubuntu: { archive: "https://sg.archive.ubuntu.com/ubuntu/" },
        },
    },
    {
        name: "oceania",
        label: "Australian mirrors",
        regions: ["AU", "NZ"],
        mirrors: {
            debian: { archive: "https://ftp.au.debian.org/debian/" },
            ubuntu: { archive: "https://au.archive.ubuntu.com/ubuntu/" },
        },
    },
    {
        name: "uk-ireland",
        label: "UK mirrors",
        regions: ["GB", "IE"],
        mirrors: {
            debian: { archive: "https://ftp.uk.debian.org/debian/" },
            ubuntu: { archive: "https://gb.archive.ubuntu.com/ubuntu/" },
        },
    },
    {
        name: "western-europe",
        label: "European mirrors",
        regions: ["DE", "AT", "CH", "NL", "BE", "FR", "IT", "ES", "PT"],
        mirrors: {
            debian: { archive: "https://deb.debian.org/debian/" },
            ubuntu: { archive: "https://archive.ubuntu.com/ubuntu/" },
        },
    },
];

export const DEFAULT_BUCKET: RegionBucket = {
    name: "default",
    label: "US mirrors (default)",
    regions: [],
    mirrors: {
        debian: { archive: "https://deb.debian.org/debian/" },
        ubuntu: { archive: "https://us.archive.ubuntu.com/ubuntu/" },
    },
};

const BUCKETS_BY_REGION: ReadonlyMap<string, RegionBucket> = new Map(
    REGION_BUCKETS.flatMap((bucket) => bucket.regions.map((region) => [region, bucket] as const)));

/**
 * Unknown and unmapped codes land in the default bucket.
 */
export function bucketFor(region: string): RegionBucket {
    return BUCKETS_BY_REGION.get(region.trim().toUpperCase()) ?? DEFAULT_BUCKET;
}

function securityArchive(family: DistroFamily, mirror: FamilyMirror): string {
    if (mirror.security) {
        return mirror.security;
    }
    // Ubuntu serves the security pocket from every archive mirror
    return family === "debian" ? DEBIAN_SECURITY : mirror.archive;
}

export function render(region: string, distro: DistributionIdentity): SourceSet {
    const mirror = bucketFor(region).mirrors[distro.family];
    const components = FAMILY_COMPONENTS[distro.family];
    if (!mirror || !components) {
        throw new MirrorSelectionError("unsupported", `No mirrors known for distribution family '${ distro.family }'`);
    }
    return SUITE_SUFFIXES.map((suffix) => ({
        uri: suffix === "-security" ? securityArchive(distro.family, mirror) : mirror.archive,
        suite: `${ distro.codename }${ suffix }`,
        suffix,
        components,
    }));
}
