import fs from 'fs';
import path from 'path';
import { MissingCredentialsError } from '../../utils/errors';

export interface SmartyCredentials {
    authId: string;
    authToken: string;
}

/**
 * Parses `auth_id=...` / `auth_token=...` lines. Blank lines and `#` comments are ignored.
 */
export function parseCredentials(content: string, source: string): SmartyCredentials {
    const values = new Map<string, string>();

    content.split(/\r?\n/).forEach((raw, idx) => {
        const line = raw.trim();
        if (!line || line.startsWith('#')) return;

        const eq = line.indexOf('=');
        if (eq <= 0) {
            throw new MissingCredentialsError(`Malformed line ${idx + 1} in ${source}: expected key=value`, source);
        }
        values.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim());
    });

    const authId = values.get('auth_id');
    const authToken = values.get('auth_token');
    const missing = [!authId && 'auth_id', !authToken && 'auth_token'].filter(Boolean);

    if (!authId || !authToken) {
        throw new MissingCredentialsError(`Invalid credentials file ${source}: missing ${missing.join(' and ')}`, source);
    }
    return { authId, authToken };
}

/** Looks for the credentials file in each directory, in order. */
export function resolveCredentialsPath(fileName: string, searchDirs: string[]): string | undefined {
    if (path.isAbsolute(fileName)) {
        return fs.existsSync(fileName) ? fileName : undefined;
    }
    return searchDirs
        .map((dir) => path.resolve(dir, fileName))
        .find((candidate) => fs.existsSync(candidate));
}

export function loadCredentials(filePath: string | undefined, displayName = 'smarty_api_key.txt'): SmartyCredentials {
    if (!filePath || !fs.existsSync(filePath)) {
        throw new MissingCredentialsError(
            `Credentials file '${filePath ?? displayName}' not found. Create it with:\nauth_id=YOUR_AUTH_ID\nauth_token=YOUR_AUTH_TOKEN`,
            filePath ?? displayName
        );
    }
    return parseCredentials(fs.readFileSync(filePath, 'utf8'), filePath);
}
