/**
 * Debug output, switched on through the environment:
 *
 *   DEBUG_ID100=1          one line per exchange (tag and payload sizes)
 *   DEBUG_ID100_LEVEL=2    also hex dumps and socket activity
 *
 * Lines go to stderr so the CLI's own output on stdout stays clean.
 */

export type DebugLevel = 0 | 1 | 2;

const PREFIX = '[id100]';

/**
 * Work out the debug level from environment variables.
 * An explicit DEBUG_ID100_LEVEL wins over the DEBUG_ID100 switch.
 */
export function resolveDebugLevel(env: NodeJS.ProcessEnv): DebugLevel {
  const enabled = env.DEBUG_ID100 === '1' || env.DEBUG_ID100 === 'true';
  const level = Number.parseInt(env.DEBUG_ID100_LEVEL || (enabled ? '1' : '0'), 10);
  if (!(level > 0)) return 0;
  return level >= 2 ? 2 : 1;
}

export const DEBUG_ID100_LEVEL: DebugLevel = resolveDebugLevel(process.env);

export function dbg(...args: unknown[]) {
  if (DEBUG_ID100_LEVEL >= 1) console.error(PREFIX, ...args);
}

// verbose
export function dbgV(...args: unknown[]) {
  if (DEBUG_ID100_LEVEL >= 2) console.error(PREFIX, ...args);
}
