import Joi from 'joi';
import { Configuration } from './types';

export const CONFIG_FILE = 'downstream-sync.json';
export const USAGE = 'Usage: downstream-sync DOWNSTREAM_TREE_TO_SYNC_TO';

const CHAINED_SCHEDULERS = [
  'scx_layered',
  'scx_rusty',
  'scx_rustland',
  'scx_rlfifo',
  'scx_asdf',
  'scx_bpfland',
  'scx_lavd'
];

export const DEFAULT_CONFIGURATION: Configuration = {
  version: '1.0.0',
  downstreamSubdir: 'tools/sched_ext',
  headers: {
    dir: 'include',
    exclude: ['include/vmlinux']
  },
  schedulers: {
    broadGroup: 'kernel-examples',
    narrowGroup: 'rust-user',
    allowList: ['scx_rusty', 'scx_layered'],
    exclude: ['meson.build']
  },
  manifest: {
    fileName: 'Cargo.toml',
    dependency: 'scx_utils'
  },
  chain: {
    targets: CHAINED_SCHEDULERS.map(name => ({
      name,
      output: name,
      command: ['cargo', 'build', '--release', '--package', name]
    })),
    aggregate: {
      name: 'rust_scheds',
      output: 'meson.build.__PHONY__',
      command: ['touch', 'meson.build.__PHONY__']
    }
  }
};

const stringList = Joi.array().items(Joi.string());

const targetDeclarationSchema = Joi.object({
  name: Joi.string().required(),
  output: Joi.string().required(),
  command: Joi.array().items(Joi.string()).min(1).required(),
  depends: stringList.optional()
});

export const configSchema = Joi.object<Configuration>({
  version: Joi.string().default(DEFAULT_CONFIGURATION.version),
  downstreamSubdir: Joi.string().allow('').default(DEFAULT_CONFIGURATION.downstreamSubdir),
  headers: Joi.object({
    dir: Joi.string().default(DEFAULT_CONFIGURATION.headers.dir),
    exclude: stringList.default(DEFAULT_CONFIGURATION.headers.exclude)
  }).default(DEFAULT_CONFIGURATION.headers),
  schedulers: Joi.object({
    broadGroup: Joi.string().default(DEFAULT_CONFIGURATION.schedulers.broadGroup),
    narrowGroup: Joi.string().default(DEFAULT_CONFIGURATION.schedulers.narrowGroup),
    allowList: stringList.default(DEFAULT_CONFIGURATION.schedulers.allowList),
    exclude: stringList.default(DEFAULT_CONFIGURATION.schedulers.exclude)
  }).default(DEFAULT_CONFIGURATION.schedulers),
  manifest: Joi.object({
    fileName: Joi.string().default(DEFAULT_CONFIGURATION.manifest.fileName),
    dependency: Joi.string().pattern(/^[A-Za-z0-9_-]+$/).default(DEFAULT_CONFIGURATION.manifest.dependency)
  }).default(DEFAULT_CONFIGURATION.manifest),
  chain: Joi.object({
    targets: Joi.array().items(targetDeclarationSchema).default(DEFAULT_CONFIGURATION.chain.targets),
    aggregate: Joi.object({
      name: Joi.string().required(),
      output: Joi.string().required(),
      command: Joi.array().items(Joi.string()).min(1).required()
    }).default(DEFAULT_CONFIGURATION.chain.aggregate)
  }).default(DEFAULT_CONFIGURATION.chain)
}).required();
