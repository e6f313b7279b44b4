// Namespaced debug logging.
//
// Logging is enabled when the DEBUG environment variable matches the
// logger's namespace (like npm's debug package): `DEBUG=xdr:*`,
// `DEBUG=xdr:codec`, `DEBUG=*,-xdr:fs`.

export interface Logger {
  readonly namespace: string;
  /** Whether DEBUG currently matches this namespace. */
  enabled(): boolean;
  /** Log a structured object when enabled. */
  log(message: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for `namespace`.
 *
 * DEBUG is read on every call, so enabling logging at runtime takes effect
 * immediately.
 *
 * @example
 * ```typescript
 * const logger = createLogger("xdr:codec");
 * logger.log("→ encode", { shape: "struct { a, b }" });
 * ```
 */
export function createLogger(namespace: string): Logger {
  return {
    namespace,
    enabled(): boolean {
      return isEnabled(namespace, process.env.DEBUG);
    },
    log(message: string, data?: Record<string, unknown>): void {
      if (!this.enabled()) return;
      if (data === undefined) {
        console.log(`${namespace} ${message}`);
      } else {
        console.log(`${namespace} ${message}`, data);
      }
    },
  };
}

/** Logger that never writes. */
export const silentLogger: Logger = {
  namespace: "",
  enabled: () => false,
  log: () => {},
};
