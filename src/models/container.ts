/**
 * A container as the tree renderers see it: its display name, every alias it
 * answers to on any network, and the names of the networks it is attached to.
 *
 * Aliases and networks never hold duplicates. Instances are filled in while the
 * topology is being built and treated as read-only afterwards; anything that
 * needs a modified view takes a clone first.
 */
export class ContainerInfo {
    readonly name: string;
    private readonly aliases: string[] = [];
    private readonly networks: string[] = [];

    constructor(name: string) {
        this.name = name;
    }

    static of(fields: { name: string, aliases?: string[], networks?: string[] }): ContainerInfo {
        const info = new ContainerInfo(fields.name);

        (fields.aliases ?? []).forEach(alias => info.addAlias(alias));
        (fields.networks ?? []).forEach(network => info.addNetwork(network));

        return info;
    }

    /**
     * @returns true if the alias was not already present
     */
    addAlias(alias: string): boolean {
        return addUnique(this.aliases, alias);
    }

    /**
     * @returns true if the network was not already present
     */
    addNetwork(network: string): boolean {
        return addUnique(this.networks, network);
    }

    hasAlias(alias: string): boolean {
        return this.aliases.includes(alias);
    }

    hasNetwork(network: string): boolean {
        return this.networks.includes(network);
    }

    sortedAliases(): string[] {
        return sortStrings(this.aliases);
    }

    sortedNetworks(): string[] {
        return sortStrings(this.networks);
    }

    aliasCount(): number {
        return this.aliases.length;
    }

    networkCount(): number {
        return this.networks.length;
    }

    clone(): ContainerInfo {
        return ContainerInfo.of({
            name: this.name,
            aliases: this.aliases,
            networks: this.networks,
        });
    }

    // Same name and networks, no aliases. Used when aliases are hidden from the output
    withoutAliases(): ContainerInfo {
        return ContainerInfo.of({
            name: this.name,
            networks: this.networks,
        });
    }
}

function addUnique(list: string[], value: string): boolean {
    if(list.includes(value)) {
        return false;
    }

    list.push(value);
    return true;
}

// Plain code unit comparison so the order never depends on the host locale
export function compareStrings(a: string, b: string): number {
    if(a < b) return -1;
    if(a > b) return 1;
    return 0;
}

export function sortStrings(list: readonly string[]): string[] {
    return [...list].sort(compareStrings);
}

export function compareByName(a: { name: string }, b: { name: string }): number {
    return compareStrings(a.name, b.name);
}
