// Configuracao Vitest do backend.
import { defineConfig } from 'vitest/config';
import { baseVitestConfig } from '../../vitest.base';

export default defineConfig({
  test: {
    ...baseVitestConfig,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      ...baseVitestConfig.coverage,
      exclude: [
        ...baseVitestConfig.coverage.exclude,
        // Depende de um MongoDB real; coberto apenas pelo contrato do repositorio.
        'src/modulos/modulo_importacao_questoes/persistencia/repositorioQuestoesMongo.ts',
        'src/index.ts'
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70
      }
    }
  }
});
