/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops a
 * plain number (a slot index, a row, a count) from being passed where
 * an EntityID is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
