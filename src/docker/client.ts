import Docker from 'dockerode';
import { compareByName, compareStrings } from '../models';
import { sanitizeContainerName } from '../topology';
import { debug } from '../logger';
import { DockerClientError } from './errors';

/**
 * The part of dockerode this tool talks to. A Docker instance fits it as-is,
 * and tests hand in an object that answers from memory instead.
 */
export interface DockerApi {
    ping(): Promise<unknown>;
    listNetworks(options?: {}): Promise<DockerNetworkSummary[]>;
    listContainers(options?: {}): Promise<DockerContainerSummary[]>;
    getNetwork(id: string): { inspect(): Promise<DockerNetworkDetail> };
    getContainer(id: string): { inspect(): Promise<DockerContainerDetail> };
}

/**
 * Connect to the daemon the same way the docker CLI would: DOCKER_HOST when it
 * is set, otherwise the local unix socket
 *
 * @param config
 * @returns Docker
 */
export function createDocker(config: { dockerSocket: string }, env: NodeJS.ProcessEnv = process.env): Docker {
    if(env.DOCKER_HOST) {
        debug(`Connecting to Docker at DOCKER_HOST '${env.DOCKER_HOST}'`);
        return new Docker();
    }

    debug(`Connecting to Docker on socket '${config.dockerSocket}'`);
    return new Docker({ socketPath: config.dockerSocket });
}

export class NetworkVizClient {
    constructor(private readonly docker: DockerApi) {}

    /**
     * Check the daemon is there before asking it for anything else
     */
    async ping(): Promise<void> {
        try{
            await this.docker.ping();
        }catch(error) {
            throw new DockerClientError('failed to ping Docker daemon', error);
        }
    }

    /**
     * Every network the daemon knows about, sorted by name
     *
     * @param options
     * @returns DockerNetworkSummary[]
     */
    async fetchNetworks(options: NetworkListOptions = {}): Promise<DockerNetworkSummary[]> {
        const listOptions: { filters?: { driver: string[] } } = {};

        if(options.drivers !== undefined && options.drivers.length > 0) {
            listOptions.filters = { driver: options.drivers };
        }

        let networks: DockerNetworkSummary[];

        try{
            networks = await this.docker.listNetworks(listOptions);
        }catch(error) {
            throw new DockerClientError('failed to list Docker networks', error);
        }

        debug(`Found ${networks.length} networks`);

        return [...networks].sort((a, b) => compareStrings(a.Name, b.Name));
    }

    async fetchNetworkById(networkId: string): Promise<DockerNetworkDetail> {
        try{
            return await this.docker.getNetwork(networkId).inspect();
        }catch(error) {
            throw new DockerClientError(`failed to inspect Docker network ${networkId}`, error);
        }
    }

    // The inspect endpoint takes a name anywhere it takes an id
    async fetchNetworkByName(name: string): Promise<DockerNetworkDetail> {
        return this.fetchNetworkById(name);
    }

    /**
     * Every container, stopped ones included unless asked otherwise, sorted by
     * display name
     *
     * @param options
     * @returns DockerContainerSummary[]
     */
    async fetchContainers(options: ContainerListOptions = {}): Promise<DockerContainerSummary[]> {
        let containers: DockerContainerSummary[];

        try{
            containers = await this.docker.listContainers({ all: options.all ?? true });
        }catch(error) {
            throw new DockerClientError('failed to list Docker containers', error);
        }

        debug(`Found ${containers.length} containers`);

        return containers
            .map(container => ({ name: sanitizeContainerName(container.Names), container }))
            .sort(compareByName)
            .map(entry => entry.container);
    }

    async fetchContainerById(containerId: string): Promise<DockerContainerDetail> {
        try{
            return await this.docker.getContainer(containerId).inspect();
        }catch(error) {
            throw new DockerClientError(`failed to inspect Docker container ${containerId}`, error);
        }
    }
}
