import type { KnipConfig } from 'knip';

const config: KnipConfig = {
  entry: ['src/index.ts!', 'src/bin/deletion-guard.ts!'],
  project: ['src/**/*.ts!', 'tests/**/*.ts'],
};

export default config;
