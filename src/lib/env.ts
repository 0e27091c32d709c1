export function sanitize(str: string): string;
export function sanitize(str: undefined): undefined;
export function sanitize(str?: string): string | undefined;
export function sanitize(str?: string) {
    return str?.replace(/[^a-zA-Z0-9_]/g, '_').toUpperCase();
}

/**
 * Looks up the most specific of `PREFIX_<FAMILY>_<CODENAME>`, `PREFIX_<CODENAME>`, `PREFIX_<FAMILY>` and `PREFIX`.
 */
export function getEnv(env: NodeJS.ProcessEnv, prefix: string, family?: string, codename?: string): string | undefined {
    const familyEnv = sanitize(family);
    const codenameEnv = sanitize(codename);

    if (familyEnv && codenameEnv) {
        return (
            env[`${ prefix }_${ familyEnv }_${ codenameEnv }`] ??
            env[`${ prefix }_${ codenameEnv }`] ??
            env[`${ prefix }_${ familyEnv }`] ??
            env[`${ prefix }`]
        )
    } else if (familyEnv) {
        return (
            env[`${ prefix }_${ familyEnv }`] ??
            env[`${ prefix }`]
        )
    } else {
        return env[`${ prefix }`];
    }
}

export function isEnabled(value: string | undefined): boolean {
    return !!value && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function parseList(value: string | undefined): string[] {
    return (value ?? "").split(",").map((item) => item.trim()).filter(Boolean);
}
