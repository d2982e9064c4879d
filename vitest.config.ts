import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{libs,packages,modules}/*/test/src/**/*.test.ts', 'service/test/src/**/*.test.ts']
  }
});
