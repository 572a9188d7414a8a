import { describe, it, expect } from 'vitest';
import { RequestUtils } from '../../index.js';

describe('RequestUtils', () => {
  it('should generate unique request IDs', () => {
    const id1 = RequestUtils.generateRequestId();
    const id2 = RequestUtils.generateRequestId();

    expect(id1).not.toBe(id2);
    expect(id1).toMatch(/^\d{13}_[a-f0-9]{8}$/);
  });

  it('should prepend the prefix', () => {
    const id = RequestUtils.generateRequestId('refresh');

    expect(id).toMatch(/^refresh_\d{13}_[a-f0-9]{8}$/);
  });
});
