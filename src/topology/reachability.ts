import { sortStrings } from '../models';
import type { NetworkToContainersMap } from './builder';

/**
 * Names of the other containers on a network, sorted. The container asking is
 * left out by name, so any container sharing its name is left out with it.
 * An unknown network has nobody on it.
 *
 * @param self name of the container doing the looking
 * @param network
 * @param networkToContainers
 * @returns string[]
 */
export function reachableContainers(self: string, network: string, networkToContainers: NetworkToContainersMap): string[] {
    const members = networkToContainers.get(network) ?? [];

    return sortStrings(members.map(member => member.name).filter(name => name !== self));
}
