import { beforeEach, vi } from 'vitest';

// Node activity is logged through console.log; keep test output to failures.
beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => { });
});
