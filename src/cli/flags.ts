/**
 * Accepts the single-dash long spellings (-host, -cn=NAME, ...) that
 * existing scripts pass, by rewriting them to their double-dash forms
 * before commander sees them
 */

export const SINGLE_DASH_FLAGS = ['host', 'port', 'ca', 'cn', 'user'] as const;

const SINGLE_DASH_FLAG = new RegExp(`^-(${SINGLE_DASH_FLAGS.join('|')})(=.*)?$`, 's');

/**
 * Rewrite an argv array (node, script, ...args). Arguments after "--" are left alone.
 */
export function normalizeFlagArgs(argv: string[]): string[] {
  const [node, script, ...args] = argv;
  const normalized: string[] = [];
  let passthrough = false;

  for (const arg of args) {
    if (passthrough) {
      normalized.push(arg);
      continue;
    }
    if (arg === '--') {
      passthrough = true;
      normalized.push(arg);
      continue;
    }
    normalized.push(SINGLE_DASH_FLAG.test(arg) ? `-${arg}` : arg);
  }

  return [node, script, ...normalized];
}
