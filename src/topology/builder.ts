import { ContainerInfo, NetworkInfo, compareByName } from '../models';
import { trimPrefix } from '../util/string';

export type ContainerMap = Map<string, ContainerInfo>;

export type NetworkToContainersMap = Map<string, ContainerInfo[]>;

/**
 * Docker reports container names with a leading "/" (e.g. "/web_app"), only the
 * first name is used for display. A container without any names gets the empty
 * string, which is a legal name everywhere else in the tool.
 *
 * @param names
 * @returns string
 */
export function sanitizeContainerName(names: readonly string[] | null | undefined): string {
    const first: string | undefined = names?.[0];

    if(first === undefined) {
        return '';
    }

    return trimPrefix(first, '/');
}

function endpointAliases(endpoint: DockerEndpointSettings | null | undefined): string[] {
    const aliases: unknown = endpoint?.Aliases;

    if(!Array.isArray(aliases)) {
        return [];
    }

    return aliases.filter((alias: unknown): alias is string => typeof alias === 'string');
}

function containerNetworks(container: DockerContainerSummary): [string, DockerEndpointSettings | null | undefined][] {
    const networks: DockerContainerNetworkMap = container.NetworkSettings?.Networks ?? {};

    return Object.entries(networks);
}

/**
 * Convert a raw container record from the daemon into a ContainerInfo, adding every
 * network it is attached to and every alias it carries on any of those networks
 *
 * @param container
 * @returns ContainerInfo
 */
export function convertToContainerInfo(container: DockerContainerSummary): ContainerInfo {
    const info = new ContainerInfo(sanitizeContainerName(container.Names));

    for(const [networkName, endpoint] of containerNetworks(container)) {
        info.addNetwork(networkName);

        for(const alias of endpointAliases(endpoint)) {
            info.addAlias(alias);
        }
    }

    return info;
}

export function convertContainersToContainerInfos(containers: readonly DockerContainerSummary[]): ContainerInfo[] {
    return containers.map(convertToContainerInfo);
}

export function convertToNetworkInfo(network: DockerNetworkSummary): NetworkInfo {
    return new NetworkInfo(network.Name, network.Driver);
}

export function convertNetworksToNetworkInfos(networks: readonly DockerNetworkSummary[]): NetworkInfo[] {
    return networks.map(convertToNetworkInfo);
}

/**
 * Key every container by its display name. When two records resolve to the same
 * name the later one replaces the earlier one, nothing is merged
 *
 * @param containers
 * @returns ContainerMap
 */
export function buildContainerMap(containers: readonly DockerContainerSummary[]): ContainerMap {
    const containerMap: ContainerMap = new Map();

    for(const container of containers) {
        const info: ContainerInfo = convertToContainerInfo(container);

        containerMap.set(info.name, info);
    }

    return containerMap;
}

/**
 * Group the containers by the networks they are attached to. This is what the
 * reachability view is computed from: two containers can talk to each other when
 * they share a bucket.
 *
 * Every bucket entry is a copy of the container's entry in the container map, so
 * nothing done to one can be seen through the other. Buckets are sorted by
 * container name, whatever order the daemon returned the containers in.
 *
 * Only networks with at least one container become keys; empty networks must be
 * taken from the network list.
 *
 * @param containers
 * @returns NetworkToContainersMap
 */
export function buildNetworkToContainersMap(containers: readonly DockerContainerSummary[]): NetworkToContainersMap {
    const containerMap: ContainerMap = buildContainerMap(containers);
    const networkToContainers: NetworkToContainersMap = new Map();

    for(const container of containers) {
        const info: ContainerInfo | undefined = containerMap.get(sanitizeContainerName(container.Names));

        if(info === undefined) {
            continue;
        }

        for(const [networkName] of containerNetworks(container)) {
            const bucket: ContainerInfo[] = networkToContainers.get(networkName) ?? [];

            bucket.push(info.clone());
            networkToContainers.set(networkName, bucket);
        }
    }

    for(const bucket of networkToContainers.values()) {
        bucket.sort(compareByName);
    }

    return networkToContainers;
}
