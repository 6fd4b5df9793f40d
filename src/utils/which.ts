/**
 * Find executables on PATH.
 */

import { access, constants } from 'fs/promises';
import { join } from 'path';

export type WhichFn = (command: string) => Promise<string | null>;

export const which: WhichFn = async (command) => {
    const pathEnv = process.env.PATH ?? '';
    const separator = process.platform === 'win32' ? ';' : ':';
    const extensions = process.platform === 'win32' ? ['', '.exe', '.cmd', '.bat', '.com'] : [''];

    for (const dir of pathEnv.split(separator).filter(Boolean)) {
        for (const ext of extensions) {
            const fullPath = join(dir, command + ext);
            try {
                await access(fullPath, constants.X_OK);
                return fullPath;
            } catch {
                // not here or not executable
            }
        }
    }

    return null;
};
