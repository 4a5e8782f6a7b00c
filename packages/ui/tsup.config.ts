import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  // Host app provides React and antd; core is a workspace dependency
  external: ['react', 'react-dom', 'react/jsx-runtime', 'antd', '@expandable-text/core'],
});
