import { vi } from 'vitest';

// Uncolored output in every test
vi.mock('picocolors', () => {
  const plain = (s: string) => s;
  return {
    default: {
      green: plain,
      red: plain,
      yellow: plain,
      cyan: plain,
      dim: plain,
      bold: plain,
      white: plain,
      gray: plain,
      blue: plain,
      magenta: plain,
    },
  };
});
