import { describe, expect, it } from 'vitest';

import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('tags the child with its component and context', () => {
    const log = createLogger('splitter', { jobId: 'job-1' });

    expect(log.bindings()).toMatchObject({ component: 'splitter', jobId: 'job-1' });
  });
});
