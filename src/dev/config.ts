/**
 * Environment-driven switches.
 * Read lazily so tests can flip `process.env` between cases.
 */

function readEnv(name: string): string | undefined {
  if (typeof process === 'undefined' || !process.env) return undefined;
  return process.env[name];
}

export function isProduction(): boolean {
  return readEnv('NODE_ENV') === 'production';
}

/**
 * `TRELLIS_DEBUG=1` (or `true`) turns on diff/patch tracing through the logger.
 */
export function isDebugEnabled(): boolean {
  const flag = readEnv('TRELLIS_DEBUG');
  return flag === '1' || flag === 'true';
}
