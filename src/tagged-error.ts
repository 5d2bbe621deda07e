/**
 * Tagged errors: real `Error` instances carrying a string `_tag` discriminant,
 * so callers can narrow on `error._tag` the way they would on a union.
 *
 * @example
 * ```typescript
 * class QuotaSpent extends TaggedError<"QuotaSpent"> {
 *   constructor(readonly account: string) {
 *     super("QuotaSpent", `QuotaSpent: ${account} has no quota left`);
 *   }
 * }
 *
 * const error = new QuotaSpent("acme");
 * error._tag; // "QuotaSpent"
 * ```
 */

/**
 * Base class for every error the library raises.
 */
export class TaggedError<Tag extends string = string> extends Error {
  readonly _tag: Tag;

  constructor(tag: Tag, message: string, options?: ErrorOptions) {
    super(message, options);
    this._tag = tag;
    this.name = tag;
  }

  /**
   * Check whether a value is a TaggedError of any tag.
   */
  static isTaggedError(value: unknown): value is TaggedError {
    return value instanceof TaggedError;
  }
}

/**
 * Extract the tag literal from a tagged error type.
 */
export type TagOf<E> = E extends { readonly _tag: infer T } ? T : never;

/**
 * Narrow a union of tagged errors to the member with the given tag.
 */
export type ErrorByTag<E, Tag extends TagOf<E>> = Extract<E, { readonly _tag: Tag }>;
