function describe(cause: unknown): string {
    if(cause instanceof Error) {
        return cause.message;
    }

    return String(cause);
}

/**
 * Anything that went wrong talking to the Docker daemon, with a description of
 * what was being attempted in front of the daemon's own message
 */
export class DockerClientError extends Error {
    constructor(context: string, cause: unknown) {
        super(`${context}: ${describe(cause)}`, { cause });
        this.name = 'DockerClientError';
    }
}
