import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'cli',
    globals: false,
    include: ['test/**/*.test.ts'],
  },
});
