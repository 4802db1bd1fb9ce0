import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // The main entry must load in a browser; node built-ins stay behind `./node`.
  {
    files: ['src/**/*.ts'],
    ignores: ['src/node.ts', 'src/store/file-sink.ts'],
    rules: {
      'no-restricted-imports': [
        'error',
        {
          patterns: [
            {
              group: ['node:*'],
              message: 'Node built-ins belong in src/store/file-sink.ts.',
            },
          ],
        },
      ],
    },
  },
  // String rendering must be deterministic for a given tree.
  {
    files: ['src/ssr/**/*.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message: 'Avoid Math.random while rendering to a string.',
        },
        {
          object: 'Date',
          property: 'now',
          message: 'Avoid Date.now while rendering to a string.',
        },
      ],
    },
  },
  {
    files: ['benches/**/*.ts', 'tests/**/*.ts'],
    rules: {
      'no-console': 'off',
    },
  },
];
