import { describe, expect, it } from 'vitest';
import { DockerClientError } from './errors';

describe('DockerClientError', () => {
    it('puts the context in front of the cause', () => {
        const cause = new Error('connect ENOENT /var/run/docker.sock');
        const error = new DockerClientError('failed to list Docker networks', cause);

        expect(error.message).toBe('failed to list Docker networks: connect ENOENT /var/run/docker.sock');
        expect(error.cause).toBe(cause);
        expect(error.name).toBe('DockerClientError');
        expect(error).toBeInstanceOf(Error);
    });

    it('describes causes that are not errors', () => {
        expect(new DockerClientError('failed to ping Docker daemon', 'timeout').message).toBe('failed to ping Docker daemon: timeout');
    });
});
