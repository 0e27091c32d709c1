import axios from "axios";
import logger from "./logger";
import type { Geolocation } from "./config";
import type { GeolocationProbe } from "./region";

export class HttpGeolocationProbe implements GeolocationProbe {
    private readonly timeoutMs: number;
    private readonly retries: number;

    constructor(options: Pick<Geolocation, "timeoutMs" | "retries">) {
        this.timeoutMs = options.timeoutMs;
        this.retries = options.retries;
    }

    async query(service: string): Promise<string | undefined> {
        for (let attempt = 0; attempt <= this.retries; attempt++) {
            try {
                const response = await axios.get<string>(service, {
                    timeout: this.timeoutMs,
                    responseType: "text",
                    headers: {
                        "Accept": "text/plain",
                        "User-Agent": "apt-mirror-select/1.0",
                    },
                });
                return typeof response.data === "string" ? response.data : String(response.data);
            } catch (err) {
                const reason = axios.isAxiosError(err) ?
                    (err.response ? `HTTP ${ err.response.status }` : (err.code ?? err.message)) :
                    String(err);
                logger.debug(`Request to ${ service } failed (attempt ${ attempt + 1 }/${ this.retries + 1 }): ${ reason }`);
            }
        }
        logger.warn(`Geolocation service ${ service } is not reachable`);
        return undefined;
    }
}
