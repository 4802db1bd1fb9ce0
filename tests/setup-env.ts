import { beforeEach, afterEach } from 'vitest';

// Bench and profiling shells may export NODE_ENV=production, which silences
// the logger; tests assert on log output, so pin development mode.
const MODE = 'development';

beforeEach(() => {
  process.env.NODE_ENV = MODE;
  document.body.innerHTML = '';
});

afterEach(() => {
  process.env.NODE_ENV = MODE;
});
