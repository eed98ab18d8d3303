/**
 * Branded strings. Construct them through @/types/coerce or a zod transform.
 */

declare const AbsolutePathBrand: unique symbol
declare const PackIdBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/** `header.uuid` of a pack manifest, trimmed. */
export type PackId = Brand<string, typeof PackIdBrand>
