/**
 * Default maximum number of members a single character class may expand to.
 *
 * Equal to the number of UTF-16 code units, so the default never rejects a
 * class; lower it to bound memory for untrusted patterns.
 *
 * @public
 */
export const DEFAULT_MAX_CLASS_MEMBERS = 65_536

/**
 * Options for pattern compilation.
 *
 * @public
 */
export interface CompileOptions {
  /**
   * Maximum number of characters one class such as `[a-z]` may expand to.
   * @defaultValue 65536
   */
  maxClassMembers?: number
}
