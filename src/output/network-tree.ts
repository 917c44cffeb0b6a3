import { ContainerInfo, NetworkInfo, compareByName } from '../models';
import { Style, plainStyle } from './style';
import { TREE_END, branchFor, indentFor } from './tree-symbols';

/**
 * Print a network followed by every container attached to it, each container
 * with its aliases underneath:
 *
 *     Network: frontend_net (bridge)
 *     ├── api
 *     │   └── alias: api
 *     └── web_app
 *         ├── alias: web
 *         └── alias: web.local
 *
 * Containers and aliases are sorted by name. The given list is left in the
 * order it came in.
 *
 * @param sink
 * @param network
 * @param containers
 * @param style
 */
export function printNetworkTree(sink: OutputSink, network: NetworkInfo, containers: readonly ContainerInfo[], style: Style = plainStyle): void {
    sink.write(`${style('label', 'Network:')} ${style('network', network.name)} (${network.driver})\n`);

    if(containers.length === 0) {
        sink.write(`${style('tree', TREE_END)} (no containers)\n`);
        return;
    }

    const sorted: ContainerInfo[] = [...containers].sort(compareByName);

    sorted.forEach((container, index) => {
        const indent: string = indentFor(index, sorted.length);

        sink.write(`${style('tree', branchFor(index, sorted.length))} ${style('container', container.name)}\n`);

        const aliases: string[] = container.sortedAliases();

        aliases.forEach((alias, aliasIndex) => {
            const prefix: string = style('tree', indent) + style('tree', branchFor(aliasIndex, aliases.length));

            sink.write(`${prefix} ${style('label', 'alias:')} ${style('alias', alias)}\n`);
        });
    });
}
