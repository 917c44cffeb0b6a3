import type { DockerApi } from '../docker';

export class StringSink implements OutputSink {
    text = '';
    isTTY = false;

    write(text: string): boolean {
        this.text += text;
        return true;
    }

    lines(): string[] {
        return this.text.split('\n');
    }
}

/**
 * A container as listContainers would return it. Names get Docker's leading
 * slash, each network maps to that endpoint's aliases
 */
export function rawContainer(name: string, networks: Record<string, string[] | null> = {}): DockerContainerSummary {
    const endpoints: DockerContainerNetworkMap = {};

    for(const [network, aliases] of Object.entries(networks)) {
        endpoints[network] = { Aliases: aliases, NetworkID: `${network}-id` };
    }

    return {
        Id: `${name}-id`,
        Names: [`/${name}`],
        NetworkSettings: { Networks: endpoints },
    };
}

export function rawNetwork(name: string, driver: string = 'bridge'): DockerNetworkDetail {
    return { Id: `${name}-id`, Name: name, Driver: driver };
}

type FakeOperation = 'ping' | 'listNetworks' | 'listContainers' | 'inspectNetwork' | 'inspectContainer';

export interface FakeDockerState {
    networks?: DockerNetworkDetail[];
    containers?: DockerContainerSummary[];
    containerDetails?: DockerContainerDetail[];
    failures?: Partial<Record<FakeOperation, Error>>;
}

/**
 * Answers the calls NetworkVizClient makes from memory, and remembers the
 * options it was called with
 */
export class FakeDocker implements DockerApi {
    readonly listNetworkOptions: unknown[] = [];
    readonly listContainerOptions: unknown[] = [];
    pings = 0;

    constructor(private readonly state: FakeDockerState = {}) {}

    private fail(operation: FakeOperation): void {
        const failure: Error | undefined = this.state.failures?.[operation];

        if(failure !== undefined) {
            throw failure;
        }
    }

    async ping(): Promise<string> {
        this.pings++;
        this.fail('ping');
        return 'OK';
    }

    async listNetworks(options?: {}): Promise<DockerNetworkSummary[]> {
        this.listNetworkOptions.push(options);
        this.fail('listNetworks');
        return [...(this.state.networks ?? [])];
    }

    async listContainers(options?: {}): Promise<DockerContainerSummary[]> {
        this.listContainerOptions.push(options);
        this.fail('listContainers');
        return [...(this.state.containers ?? [])];
    }

    getNetwork(id: string): { inspect(): Promise<DockerNetworkDetail> } {
        return {
            inspect: async () => {
                this.fail('inspectNetwork');

                const network = (this.state.networks ?? []).find(item => item.Id === id || item.Name === id);

                if(network === undefined) {
                    throw new Error(`network ${id} not found`);
                }

                return network;
            },
        };
    }

    getContainer(id: string): { inspect(): Promise<DockerContainerDetail> } {
        return {
            inspect: async () => {
                this.fail('inspectContainer');

                const container = (this.state.containerDetails ?? []).find(item => item.Id === id || item.Name === `/${id}`);

                if(container === undefined) {
                    throw new Error(`No such container: ${id}`);
                }

                return container;
            },
        };
    }
}
