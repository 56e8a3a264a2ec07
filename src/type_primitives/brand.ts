/***
 * Brand - Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: an EntryID is a plain number at runtime, but a bucket index
 * cannot be passed where Brand<number, "entry_id"> is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
