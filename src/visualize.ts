import { ContainerInfo, NetworkInfo, sortStrings } from './models';
import { ContainerMap, NetworkToContainersMap, buildContainerMap, buildNetworkToContainersMap, convertNetworksToNetworkInfos } from './topology';
import { Style, plainStyle, printContainerTree, printNetworkTree } from './output';
import { DockerClientError, NetworkVizClient } from './docker';
import { debug } from './logger';

export interface Topology {
    networks: NetworkInfo[];
    containerMap: ContainerMap;
    networkToContainers: NetworkToContainersMap;
}

/**
 * Copies of the containers with their aliases emptied, names and networks kept.
 * The containers passed in are not touched.
 *
 * @param containers
 * @returns ContainerInfo[]
 */
export function removeAliasesFromContainers(containers: readonly ContainerInfo[]): ContainerInfo[] {
    return containers.map(container => container.withoutAliases());
}

/**
 * Print both views: every network with its containers, then every container
 * with the containers it can reach. The filters match names exactly, an empty
 * filter lets everything through.
 *
 * @param sink
 * @param topology
 * @param options
 * @param style
 */
export function printVisualization(sink: OutputSink, topology: Topology, options: VisualizeOptions, style: Style = plainStyle): void {
    sink.write('=== Networks ===\n');

    for(const network of topology.networks) {
        if(options.onlyNetwork !== '' && network.name !== options.onlyNetwork) {
            continue;
        }

        let members: ContainerInfo[] = topology.networkToContainers.get(network.name) ?? [];

        if(options.noAliases) {
            members = removeAliasesFromContainers(members);
        }

        printNetworkTree(sink, network, members, style);
        sink.write('\n');
    }

    sink.write('=== Containers (Reachability) ===\n');

    for(const name of sortStrings([...topology.containerMap.keys()])) {
        if(options.container !== '' && name !== options.container) {
            continue;
        }

        const container: ContainerInfo | undefined = topology.containerMap.get(name);

        if(container === undefined) {
            continue;
        }

        printContainerTree(sink, container, topology.networkToContainers, style);
        sink.write('\n');
    }
}

/**
 * Ask the daemon for its networks and containers and print the topology. Both
 * lists are fetched before anything is printed, so a failure leaves the output
 * empty rather than half written.
 *
 * @param client
 * @param sink
 * @param options
 * @param style
 */
export async function runVisualize(client: NetworkVizClient, sink: OutputSink, options: VisualizeOptions, style: Style = plainStyle): Promise<void> {
    let networks: DockerNetworkSummary[];
    let containers: DockerContainerSummary[];

    try{
        networks = await client.fetchNetworks();
    }catch(error) {
        throw new DockerClientError('failed to fetch networks', error);
    }

    try{
        containers = await client.fetchContainers({ all: true });
    }catch(error) {
        throw new DockerClientError('failed to fetch containers', error);
    }

    const topology: Topology = {
        networks: convertNetworksToNetworkInfos(networks),
        containerMap: buildContainerMap(containers),
        networkToContainers: buildNetworkToContainersMap(containers),
    };

    debug('Visualizing with options', options);

    printVisualization(sink, topology, options, style);
}
