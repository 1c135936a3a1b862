import { afterEach, beforeEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';

let spies: Array<MockInstance<Parameters<typeof console.log>, void>> = [];

beforeEach(() => {
  spies = [
    vi.spyOn(console, 'log').mockImplementation(() => {}),
    vi.spyOn(console, 'info').mockImplementation(() => {}),
    vi.spyOn(console, 'warn').mockImplementation(() => {}),
    vi.spyOn(console, 'error').mockImplementation(() => {}),
  ];
});

afterEach(() => {
  for (const spy of spies) spy.mockRestore();
  spies = [];
});
