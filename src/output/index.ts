export { printContainerTree } from './container-tree';
export { printNetworkTree } from './network-tree';
export { createStyle, plainStyle, shouldUseColor } from './style';
export type { Style, StyleCategory } from './style';
export { TREE_BRANCH, TREE_END, TREE_SPACE, TREE_VERTICAL } from './tree-symbols';
