import logger from "./logger";

export const DEFAULT_REGION = "US";

const SENTINELS = ["null", "undefined"];

export interface GeolocationProbe {
    /**
     * Queries one geolocation service, resolving to its raw response body or `undefined` when the service
     * failed within its own timeout and retry budget.
     */
    query(service: string): Promise<string | undefined>;
}

export type RegionSource = "override" | "probe" | "default";

export type RegionResolution = {
    region: string,
    source: RegionSource,
    service?: string,
    warning?: string,
};

function isUsable(value: string | undefined): value is string {
    return !!value && !SENTINELS.includes(value.toLowerCase());
}

/**
 * Turns a service response into an upper-case two-letter code, `undefined` for anything else.
 */
export function normalizeCountryCode(raw: string | undefined): string | undefined {
    const value = raw?.replace(/[\r\n]/g, "").trim();
    if (!isUsable(value) || !/^[A-Za-z]{2}$/.test(value)) {
        return undefined;
    }
    return value.toUpperCase();
}

export async function resolveRegion(override: string | undefined, probe: GeolocationProbe,
    services: readonly string[]): Promise<RegionResolution> {
    const forced = override?.trim();
    if (isUsable(forced)) {
        logger.info(`Forcing country ${ forced }`);
        return { region: forced, source: "override" };
    }

    logger.info("Detecting geographical location...");
    for (const service of services) {
        logger.info(`Trying service: ${ service }`);
        const raw = await probe.query(service);
        const region = normalizeCountryCode(raw);
        if (region) {
            logger.info(`Location detected: ${ region }`);
            return { region, source: "probe", service };
        }
        if (raw !== undefined) {
            logger.debug(`Unusable response from ${ service }: '${ raw.trim() }'`);
        }
    }

    const warning = `Geolocation detection failed, using default (${ DEFAULT_REGION })`;
    logger.warn(warning);
    return { region: DEFAULT_REGION, source: "default", warning };
}
