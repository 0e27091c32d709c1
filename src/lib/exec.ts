import logger, { colorize } from "./logger";
import { type ChildProcess, spawn } from "child_process";
import { quote } from "shell-quote";

export interface ActionResult {
    result: "success" | "error" | "script";
    error?: Error | number | undefined;
    message: string;
    output?: string;
}

type Stdio = "stdout" | "stderr";

export interface ExecOptions {
    cwd?: string;
    stderrAsInfo?: boolean;
    errorAsWarn?: boolean;
    captureOutput?: boolean;
    quiet?: boolean;
}

/**
 * Splits a child's output stream into lines for logging, optionally handing each raw chunk on as well.
 */
function followLines(
    stream: NodeJS.ReadableStream | null,
    onLine: (line: string) => void,
    onChunk?: (data: Buffer) => void
): void {
    if (!stream) return;

    let pending = '';

    stream.on('data', (data: Buffer) => {
        onChunk?.(data);
        const lines = (pending + data.toString()).split(/\r?\n/);
        pending = lines.pop() ?? '';
        lines.filter(Boolean).forEach(onLine);
    });

    stream.on('end', () => {
        if (pending) {
            onLine(pending);
        }
    });
}

function lineLevel(opts: ExecOptions, stdio: Stdio): string {
    if (opts.quiet) {
        return "debug";
    }
    return stdio === "stderr" && !opts.stderrAsInfo ? "warn" : "info";
}

export async function execOpt(opts: ExecOptions, executable: string, ...args: string[]): Promise<ActionResult> {
    logger.info(`[${ executable }] Executing: ${ quote([executable, ...args]) }`);

    let child: ChildProcess | null = null;
    let spawnError: Error | null = null;
    let exitCode: number | null = null;
    let scriptStderr = '';
    let scriptStdout = '';
    const loggerError = opts.errorAsWarn ? logger.warn.bind(logger) : logger.error.bind(logger);

    try {
        child = spawn(executable, args, {
            cwd: opts.cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
            detached: false
        });
    } catch (err) {
        loggerError(`[${ executable }] Failed to run executable:`, { err });
        spawnError = err instanceof Error ? err : new Error(String(err));
    }

    if (child) {
        const logLine = (stdio: Stdio, line: string) => {
            const level = lineLevel(opts, stdio);
            logger.log(level, `[${ executable } ${ colorize.colorize(level, stdio) }]: ${ line }`);
        };

        followLines(
            child.stdout,
            (line) => logLine("stdout", line),
            opts.captureOutput ? (data) => scriptStdout += data.toString() : undefined
        );

        followLines(
            child.stderr,
            (line) => logLine("stderr", line),
            (data) => scriptStderr += data.toString()
        );

        const runningChild = child;
        exitCode = await new Promise<number | null>((resolve) => {
            runningChild.on('error', (err) => {
                loggerError(`[${ executable }] Failed to run executable:`, { err });
                spawnError = err;
            });

            runningChild.on('close', (code) => {
                if (code !== null && ((!spawnError && code !== 0) || logger.isDebugEnabled())) {
                    logger.log(code ? "warn" : "debug", `[${ executable }] Execution finished with exit code: ${ code }`);
                }
                resolve(code);
            });
        });
    }

    const result: ActionResult = {
        result: spawnError ? "error" : exitCode === 0 ? "success" : "script",
        error: spawnError ?? (exitCode !== 0 ? exitCode ?? undefined : undefined),
        message: scriptStderr
    };
    if (opts.captureOutput) {
        result.output = scriptStdout;
    }
    return result;
}
