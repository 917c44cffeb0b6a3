import { inspect } from 'util';

// Diagnostics go to stderr so they never end up mixed into the trees on stdout.
// Set DEBUG to anything to see them.

export function isDebug(): boolean {
    return Boolean(process.env.DEBUG);
}

export function debug(message: string, data?: unknown): void {
    if(!isDebug()) {
        return;
    }

    console.error(message);

    if(data !== undefined) {
        console.error(inspect(data, { depth: null }));
    }
}
