import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'types/index': 'src/types/index.ts',
    'config/index': 'src/config/index.ts',
    'utils/errors': 'src/utils/errors.ts', // Error types and formatting
    'utils/logger': 'src/utils/logger.ts', // Scoped console logger with level filter
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
});
