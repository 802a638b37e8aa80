/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const ArchiveUrlBrand: unique symbol
declare const DestNameBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/** An http(s) URL pointing at a gzip-compressed tar archive. */
export type ArchiveUrl = Brand<string, typeof ArchiveUrlBrand>

/**
 * Name of a plugin's directory inside the plugin directory.
 * Guarantees: a single path segment, never "." or "..".
 */
export type DestName = Brand<string, typeof DestNameBrand>
