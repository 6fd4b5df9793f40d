/**
 * Sessions that own the terminal. While one is held, Ctrl-C belongs to the
 * remote side, and the CLI must not exit before the session is terminated.
 */

let held = 0;

/**
 * Mark a session as in the foreground; the returned function releases it (once).
 */
export function holdForeground(): () => void {
    held += 1;
    let released = false;
    return () => {
        if (released) return;
        released = true;
        held -= 1;
    };
}

export function foregroundHeld(): boolean {
    return held > 0;
}
