import winston, { type LoggerOptions } from "winston";
import { isEnabled } from "./env";

function describeCause(cause: unknown): string | undefined {
    if (cause instanceof Error) {
        return cause.stack ?? `${ cause.name }: ${ cause.message }`;
    }
    return cause === undefined || cause === null ? undefined : String(cause);
}

/**
 * Moves an `err` meta field into printable `err_message` and `err_cause` lines.
 */
const errorDetails = winston.format((info) => {
    const err = info.err ?? info.error;
    if (err instanceof Error) {
        info.err_message = err.stack ?? `${ err.name }: ${ err.message }`;
        info.err_cause = describeCause(err.cause);
    } else if (err !== null && err !== undefined) {
        info.err_message = String(err);
    }
    return info;
});

const upperCaseLevel = winston.format((info) => {
    info.level = info.level.toUpperCase();
    return info;
});

const outputFormat = winston.format.printf((info) => {
    const lines = [
        `[${ info.level }] ${ info.timestamp ? `${ info.timestamp } ` : "" }${ info.message }`,
        ...(info.err_message ? [`${ info.err_message }`] : []),
        ...(info.err_cause ? [`Caused by: ${ info.err_cause }`] : []),
    ];
    return lines.join("\n").split("\n").map((line, index) => index === 0 ? line : `    ${ line }`).join("\n");
});

function defaultLevel(env: NodeJS.ProcessEnv): string {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    return isEnabled(env.DEBUG) ? "debug" : "info";
}

export const colorize = winston.format.colorize({ level: true });

const loggerOpts: LoggerOptions = {
    level: defaultLevel(process.env),
    transports: [
        new winston.transports.Console({
            // Everything goes to stderr, stdout is left to the caller
            stderrLevels: Object.keys(winston.config.npm.levels),
            format: winston.format.combine(
                errorDetails(),
                upperCaseLevel(),
                winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
                winston.format.splat(),
                colorize,
                outputFormat
            )
        })
    ]
};

const logger = winston.createLogger(loggerOpts);

export default logger;
