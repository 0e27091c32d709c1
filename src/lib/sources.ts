import _ from "lodash";
import type { MirrorEntry, SourceSet } from "./catalog";

export function formatSourceLine(entry: MirrorEntry): string {
    return ["deb", entry.uri, entry.suite, ...entry.components].join(" ");
}

export function formatSourceList(sourceSet: SourceSet): string {
    return sourceSet.map(formatSourceLine).join("\n") + "\n";
}

export function hostnameOf(uri: string): string | undefined {
    try {
        const hostname = new URL(uri).hostname.toLowerCase();
        return hostname ? hostname : undefined;
    } catch {
        return undefined;
    }
}

export function sourceSetHostnames(sourceSet: SourceSet): Set<string> {
    const hostnames = new Set<string>();
    for (const entry of sourceSet) {
        const hostname = hostnameOf(entry.uri);
        if (hostname) {
            hostnames.add(hostname);
        }
    }
    return hostnames;
}

/**
 * Collects repository URIs from one-line (`deb [opts] uri suite ...`) and deb822 (`URIs: ...`) sources content.
 */
export function extractSourceUris(content: string): string[] {
    const uris: string[] = [];
    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith("#")) {
            continue;
        }

        const oneLine = line.match(/^deb(?:-src)?\s+(?:\[[^\]]*\]\s+)?(\S+)/);
        if (oneLine) {
            uris.push(oneLine[1]);
            continue;
        }

        const deb822 = line.match(/^URIs:\s*(.*)$/i);
        if (deb822) {
            uris.push(...deb822[1].split(/\s+/).filter(Boolean));
        }
    }
    return uris;
}

export function extractHostnames(content: string): Set<string> {
    const hostnames = new Set<string>();
    for (const uri of extractSourceUris(content)) {
        const hostname = hostnameOf(uri);
        if (hostname) {
            hostnames.add(hostname);
        }
    }
    return hostnames;
}

/**
 * Whole-name match, so `archive.ubuntu.com` does not match inside `us.archive.ubuntu.com`.
 */
export function mentionsHostname(content: string, hostname: string): boolean {
    const pattern = new RegExp(`(^|[^a-z0-9.-])${ _.escapeRegExp(hostname.toLowerCase()) }($|[^a-z0-9.-])`, "m");
    return pattern.test(content.toLowerCase());
}
