import { defineConfig } from 'cspell'

export default defineConfig({
  words: [
    'bodylen',
    'commitish',
    'nanospinner',
    'noreply',
    'picocolors',
    'prepend',
    'retriable',
    'undici',
  ],
  ignorePaths: ['dist', 'license', 'package-lock.json', 'tsconfig.json'],
  dictionaries: ['node', 'npm', 'typescript'],
  useGitignore: true,
  language: 'en',
})
