/**
 * Each test file belongs to exactly one Vitest project.
 */
import { describe, it, expect } from 'vitest';
import config from '../../vitest.config.js';

describe('vitest projects', () => {
  it('leaves file selection to the projects so nothing runs twice', () => {
    expect(config.test?.include).toBeUndefined();

    const includes = (config.test?.projects ?? []).map((project) =>
      typeof project === 'object' && 'test' in project ? project.test?.include : undefined,
    );
    expect(includes).toEqual([['test/unit/**/*.test.ts'], ['test/integration/**/*.test.ts']]);
  });
});
