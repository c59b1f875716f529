/**
 * Flat key generation for backends without a native namespace.
 * Realm and id are joined with a separator so a realm can be cleared by prefix.
 * The realm is percent-encoded, so it never contains the separator itself.
 */

export const REALM_SEPARATOR = '/';

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /**
   * Build a flat key from realm and id.
   * Format: `{globalPrefix}:{realm}/{id}`, or `{realm}/{id}` without a prefix,
   * with the realm percent-encoded
   */
  build(realm: string, id: string): string;

  /**
   * Get the prefix matching every key of a realm (for clearing).
   * Format: `{globalPrefix}:{realm}/`
   */
  getRealmPrefix(realm: string): string;

  /**
   * Get the prefix matching every key handled by this builder.
   * Empty when no global prefix is configured.
   */
  getGlobalPrefix(): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilderOptions {
  /** Prefix shared by every key, e.g. to share a Redis database. Default: none */
  globalPrefix?: string;
}

/**
 * Create a key builder instance.
 */
export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? '';
  const head = globalPrefix === '' ? '' : `${globalPrefix}:`;
  const realmHead = (realm: string): string =>
    `${head}${encodeURIComponent(realm)}${REALM_SEPARATOR}`;

  return {
    build(realm: string, id: string): string {
      return `${realmHead(realm)}${id}`;
    },

    getRealmPrefix(realm: string): string {
      return realmHead(realm);
    },

    getGlobalPrefix(): string {
      return head;
    },
  };
};
