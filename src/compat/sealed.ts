/**
 * The conversion capability
 *
 * A type can be converted only if it implements `Compat<T>` for its
 * counterpart `T`. The key is a module-private symbol that is not re-exported
 * from the package entry, so the set of implementations stays closed: the
 * pairings declared in this package are the only ones that exist.
 */

export const COMPAT: unique symbol = Symbol('primitives-compat');

/**
 * Capability to convert a value into its counterpart of type `T`
 */
export interface Compat<T> {
  [COMPAT](): T;
}
