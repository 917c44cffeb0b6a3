export {
    buildContainerMap,
    buildNetworkToContainersMap,
    convertContainersToContainerInfos,
    convertNetworksToNetworkInfos,
    convertToContainerInfo,
    convertToNetworkInfo,
    sanitizeContainerName,
} from './builder';
export type { ContainerMap, NetworkToContainersMap } from './builder';
export { reachableContainers } from './reachability';
