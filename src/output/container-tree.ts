import { ContainerInfo } from '../models';
import { NetworkToContainersMap, reachableContainers } from '../topology';
import { Style, plainStyle } from './style';
import { TREE_END, TREE_SPACE, branchFor, indentFor } from './tree-symbols';

/**
 * Print a container, each network it is on, and who it can talk to there:
 *
 *     Container: api
 *     ├── Network: backend_net
 *     │   └── connects to:
 *     │       ├── postgres
 *     │       └── redis
 *     └── Network: frontend_net
 *         └── connects to:
 *             └── (none)
 *
 * A container that isn't on any network only gets the header line.
 *
 * @param sink
 * @param container
 * @param networkToContainers
 * @param style
 */
export function printContainerTree(sink: OutputSink, container: ContainerInfo, networkToContainers: NetworkToContainersMap, style: Style = plainStyle): void {
    sink.write(`${style('label', 'Container:')} ${style('container', container.name)}\n`);

    const networks: string[] = container.sortedNetworks();

    networks.forEach((network, index) => {
        const indent: string = indentFor(index, networks.length);

        sink.write(`${style('tree', branchFor(index, networks.length))} ${style('label', 'Network:')} ${style('network', network)}\n`);

        // "connects to:" is the only child of the network, so it always closes the branch
        sink.write(`${style('tree', indent)}${style('tree', TREE_END)} ${style('label', 'connects to:')}\n`);

        const peers: string[] = reachableContainers(container.name, network, networkToContainers);

        if(peers.length === 0) {
            sink.write(`${style('tree', indent)}${TREE_SPACE}${style('tree', TREE_END)} (none)\n`);
            return;
        }

        peers.forEach((peer, peerIndex) => {
            sink.write(`${style('tree', indent)}${TREE_SPACE}${style('tree', branchFor(peerIndex, peers.length))} ${style('container', peer)}\n`);
        });
    });
}
