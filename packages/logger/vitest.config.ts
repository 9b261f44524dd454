import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'logger',
    globals: false,
    include: ['test/**/*.test.ts'],
  },
});
