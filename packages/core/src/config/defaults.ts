import type { DocstringerConfig } from './types.js';

export const DEFAULT_CONFIG: DocstringerConfig = {
  parser: {
    enableTreeSitter: true,
    enableFallback: true,
  },
  formatter: 'builtin',
  checker: 'declarations',
  exclude: [],
};
