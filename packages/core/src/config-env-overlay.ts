import { isRecord } from './utils.js';

const PREFIX = 'PARLEY_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/** `MAX_ITERATIONS` → `maxIterations`. */
function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `PARLEY_`. Nesting is expressed
 * with double-underscore (`__`); single underscores inside a segment map to
 * camelCase. Values are coerced to numbers/booleans where possible.
 *
 * Example: `PARLEY_AGENT__MAX_ITERATIONS=8`
 *   → `config.agent.maxIterations = 8`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends Record<string, unknown>>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;
    // PARLEY_CONFIG names the config file itself
    if (key === 'PARLEY_CONFIG') continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR).map(toCamelCase);
    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

function setNested(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current: Record<string, unknown> = obj;

  for (const segment of path.slice(0, -1)) {
    const next = current[segment];

    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  const leaf = path[path.length - 1];
  if (leaf !== undefined) current[leaf] = value;
}
