export { createNodeIO } from './node-io';
export type { IO, PathApi } from './types';
