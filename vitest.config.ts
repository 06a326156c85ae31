import { createRequire } from 'node:module';
import ts from 'typescript';
import { defineConfig, type Plugin } from 'vitest/config';

function typescriptTranspile(): Plugin {
  return {
    name: 'typescript-transpile',
    transform(code, id) {
      const file = id.split('?')[0];
      if (!file.endsWith('.ts') || file.includes('/node_modules/')) {
        return null;
      }
      const output = ts.transpileModule(code, {
        fileName: file,
        compilerOptions: {
          module: ts.ModuleKind.ESNext,
          target: ts.ScriptTarget.ES2022,
          sourceMap: true,
          inlineSources: true,
          esModuleInterop: true
        }
      });
      return {
        code: output.outputText.replace(/\/\/# sourceMappingURL=.*$/m, ''),
        map: output.sourceMapText
      };
    }
  };
}

export default defineConfig({
  resolve: {
    // Load @opentelemetry/api as Node does (its CJS build), so tests and the
    // externalized SDK share one API instance instead of an ESM/CJS pair
    alias: [
      {
        find: /^@opentelemetry\/api$/,
        replacement: createRequire(import.meta.url).resolve('@opentelemetry/api')
      }
    ]
  },
  // esbuild renames function expressions that shadow an outer binding
  // (`const slow = instrument(function slow() {})` becomes `slow2`), and span
  // names derive from fn.name; transpile with TypeScript as tsc emits instead
  esbuild: false,
  plugins: [typescriptTranspile()],
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.test.ts',
        '**/index.ts',
        'src/cli/**'
      ],
      thresholds: {
        statements: 70,
        branches: 60,
        functions: 70,
        lines: 70
      }
    },
  },
});
