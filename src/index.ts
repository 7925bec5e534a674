export { DownstreamSync } from './downstream-sync';
export { default } from './downstream-sync';
export * from './types';
export * from './constants';
export * from './errors';
export * from './config';
export * from './enumerator';
export * from './path-mapper';
export * from './manifest-transformer';
export * from './existence-validator';
export * from './diff-sync';
export * from './build-chainer';
