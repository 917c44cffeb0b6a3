// Remove a prefix exactly once, leaving anything after it alone
export function trimPrefix(string: string, prefix: string): string {
    if(prefix.length > 0 && string.startsWith(prefix)) {
        return string.substring(prefix.length);
    }

    return string;
}
