import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external; node_modules resolves them
const externalDependencies = [
  'chalk',
  'winston',
  'yaml'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const esbuildOptions = (options: EsbuildOptions) => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@interpreter': './interpreter',
    '@cli': './cli'
  };

  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';

  return options;
};

export default defineConfig([
  // CLI build; the entry keeps its #! line
  {
    entry: {
      'brl-yaml-check': 'bin/brl-yaml-check.ts'
    },
    format: ['esm'],
    dts: false,
    clean: true,
    sourcemap: true,
    treeshake: {
      preset: 'recommended'
    },
    outDir: 'dist',
    outExtension() {
      return {
        js: '.js'
      };
    },
    external: externalDependencies,
    noExternal: ['@core/*', '@services/*', '@interpreter/*', '@cli/*'],
    esbuildOptions(options) {
      return esbuildOptions(options);
    }
  }
]);
