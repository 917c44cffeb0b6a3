export { NetworkVizClient, createDocker } from './client';
export type { DockerApi } from './client';
export { DockerClientError } from './errors';
