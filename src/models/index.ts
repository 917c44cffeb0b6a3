export { ContainerInfo, compareByName, compareStrings, sortStrings } from './container';
export { NetworkInfo } from './network';
