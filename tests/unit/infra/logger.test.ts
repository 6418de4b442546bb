import { describe, expect, it } from 'vitest';

import * as loggerModule from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured name and level', () => {
    const logger = loggerModule.createLogger({ name: 'rollup-test', level: 'warn', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toMatchObject({ name: 'rollup-test' });
  });

  it('defaults the name to the project name', () => {
    const logger = loggerModule.createLogger({ level: 'silent' });

    expect(logger.bindings()).toMatchObject({ name: 'practice-imd-rollup' });
  });

  it('exports only the logger factory at runtime', () => {
    expect(Object.keys(loggerModule)).toEqual(['createLogger']);
  });
});
