/**
 * Field-level merge rules shared by the overlay merges. In every rule the
 * overlay is the first argument and neither input is mutated.
 */

/** Scalar rule: the overlay value when present, else the base value. */
export function pick<T>(overlay: T | undefined, base: T): T {
  return overlay !== undefined ? overlay : base;
}

/**
 * Mapping rule: union of keys, the overlay's value wins for a shared key.
 * Values are not merged further: an overlay list replaces the base list.
 */
export function unionKeys<M extends object>(overlay: M | undefined, base: M | undefined): M | undefined {
  if (overlay === undefined) return base;
  if (base === undefined) return overlay;
  return { ...base, ...overlay };
}

/** Ordered collection rule: overlay elements first, then base elements. */
export function concatOverlayFirst<T>(overlay: readonly T[] | undefined, base: readonly T[] | undefined): T[] | undefined {
  if (overlay === undefined) return base === undefined ? undefined : [...base];
  if (base === undefined) return [...overlay];
  return [...overlay, ...base];
}

/** Nested structure rule: adopt whichever side exists, merge with `both` when both do. */
export function mergeNested<T>(
  overlay: T | undefined,
  base: T | undefined,
  both: (overlay: T, base: T) => T,
): T | undefined {
  if (overlay === undefined) return base;
  if (base === undefined) return overlay;
  return both(overlay, base);
}
