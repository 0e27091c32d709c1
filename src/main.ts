#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./lib/config";
import logger from "./lib/logger";
import { selectMirror } from "./lib/select";
import { MirrorSelectionError } from "./lib/errors";

async function main(): Promise<number> {
    const config = loadConfig(process.env);
    try {
        await selectMirror({ config });
        logger.info("You can now use 'apt-get update' and 'apt-get install' with optimized mirrors");
        return 0;
    } catch (err) {
        if (err instanceof MirrorSelectionError) {
            logger.error(`Mirror configuration failed (${ err.kind }): ${ err.message }`, { err });
            if (err.kind === "refresh") {
                logger.warn("Please check your internet connection and try again.");
            }
        } else {
            logger.error("Mirror configuration failed", { err });
        }
        return 1;
    }
}

main().then((code) => {
    process.exitCode = code;
}, (err: unknown) => {
    logger.error("Unexpected failure", { err });
    process.exitCode = 1;
});
