import { describe, it, expect } from 'vitest';
import { loader } from './healthz';

describe('GET /healthz', () => {
  it('reports ok', async () => {
    const res = await loader();
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });
});
