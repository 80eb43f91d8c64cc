// debug.ts
/**
 * Logs to the console when `DEBUG` names the namespace. `DEBUG` takes a comma
 * or space separated list of namespaces, `*`, or prefix wildcards such as
 * `stream:*`.
 */
export function dlog(ns: string, ...args: unknown[]) {
  const enabled = process.env.DEBUG;
  if (!enabled) return;
  const tokens = enabled.split(/[\s,]+/).filter(Boolean);
  const prefix = ns.slice(0, ns.indexOf(':') + 1);
  const matches = tokens.some((token) =>
    token === ns || token === '*' || (prefix !== '' && token === `${prefix}*`),
  );
  if (matches) {
    // eslint-disable-next-line no-console
    console.log(`[${ns}]`, ...args);
  }
}
