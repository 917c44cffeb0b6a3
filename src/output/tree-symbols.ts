// Box drawing pieces every tree is made of

// Before an item that has more siblings after it
export const TREE_BRANCH = '├──';

// Before the last item of a list
export const TREE_END = '└──';

// Indent under an item that has more siblings after it
export const TREE_VERTICAL = '│   ';

// Indent under the last item of a list
export const TREE_SPACE = '    ';

export function branchFor(index: number, length: number): string {
    return index === length - 1 ? TREE_END : TREE_BRANCH;
}

export function indentFor(index: number, length: number): string {
    return index === length - 1 ? TREE_SPACE : TREE_VERTICAL;
}
