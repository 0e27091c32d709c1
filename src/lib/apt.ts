import type { Apt } from "./config";
import { type ActionResult, execOpt } from "./exec";

/**
 * The package manager operations a mirror selection run needs. Only the outcome of each call matters,
 * except for the captured output of the diagnostic calls.
 */
export interface PackageManager {
    clean(): Promise<ActionResult>;

    update(): Promise<ActionResult>;

    download(packageName: string, cwd: string): Promise<ActionResult>;

    policy(): Promise<ActionResult>;

    debugUpdate(): Promise<ActionResult>;
}

export class AptGet implements PackageManager {
    private readonly apt: Apt;

    constructor(apt: Apt) {
        this.apt = apt;
    }

    private acquireOptions(): string[] {
        return [
            "-o", `Acquire::Retries=${ this.apt.retries }`,
            "-o", `Acquire::http::Timeout=${ this.apt.timeoutSec }`,
            "-o", `Acquire::https::Timeout=${ this.apt.timeoutSec }`,
        ];
    }

    async clean(): Promise<ActionResult> {
        return await execOpt({ errorAsWarn: true }, this.apt.aptGetBin, "clean");
    }

    async update(): Promise<ActionResult> {
        return await execOpt({}, this.apt.aptGetBin, "update", "-y", ...this.acquireOptions());
    }

    async download(packageName: string, cwd: string): Promise<ActionResult> {
        return await execOpt({ cwd, errorAsWarn: true, quiet: true }, this.apt.aptGetBin,
            "download", ...this.acquireOptions(), packageName);
    }

    async policy(): Promise<ActionResult> {
        return await execOpt({ errorAsWarn: true, quiet: true, captureOutput: true }, this.apt.aptCacheBin, "policy");
    }

    async debugUpdate(): Promise<ActionResult> {
        return await execOpt({ errorAsWarn: true, stderrAsInfo: true, quiet: true, captureOutput: true },
            this.apt.aptGetBin, "update", "-o", "Debug::Acquire::http=true");
    }
}
