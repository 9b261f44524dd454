import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'calculator',
    globals: false,
    include: ['test/**/*.test.ts'],
  },
});
