// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.test.ts'],
    environment: 'node',
    // nested quadrature (products, Bayesian marginals) runs a few million integrand calls
    testTimeout: 30000,
  },
});
