import { defineConfig } from '@tagsense/tsup-config';

export default defineConfig({
  entry: {
    cli: 'src/cli.ts',
  },
  banner: {
    js: '#!/usr/bin/env node',
  },
  noExternal: [/^@tagsense\//],
});
