/**
 * Filter expressions understood by every search index backend.
 *
 * Filters are a small AST rather than a string so that backends can
 * render them safely (SQL parameters for SQLite) and so that the
 * governing site can inspect and narrow filters sent by brands.
 * {@link formatFilter} renders the `field:"value"` DSL for logs.
 */

// ── Types ─────────────────────────────────────────────────────────────

/** Record attributes that may appear in a filter. */
export const FILTER_FIELDS = ["site_url", "post_type", "document_id", "post_id"] as const;

export type FilterField = (typeof FILTER_FIELDS)[number];

export type FilterValue = string | number;

export type Filter =
  | { op: "eq"; field: FilterField; value: FilterValue }
  | { op: "in"; field: FilterField; values: FilterValue[] }
  | { op: "and"; filters: Filter[] }
  | { op: "or"; filters: Filter[] };

// ── Builders ──────────────────────────────────────────────────────────

export function eq(field: FilterField, value: FilterValue): Filter {
  return { op: "eq", field, value };
}

export function anyOf(field: FilterField, values: readonly FilterValue[]): Filter {
  return { op: "in", field, values: [...values] };
}

/**
 * Conjunction of the given parts.  `undefined` parts are dropped and a
 * single remaining part is returned as is.
 */
export function and(...parts: (Filter | undefined)[]): Filter | undefined {
  const filters = parts.filter((p): p is Filter => p !== undefined);
  if (filters.length === 0) return undefined;
  if (filters.length === 1) return filters[0];
  return { op: "and", filters };
}

/** Disjunction of the given parts, simplified like {@link and}. */
export function or(...parts: (Filter | undefined)[]): Filter | undefined {
  const filters = parts.filter((p): p is Filter => p !== undefined);
  if (filters.length === 0) return undefined;
  if (filters.length === 1) return filters[0];
  return { op: "or", filters };
}

/** `field = v1 OR field = v2 …`, or `undefined` for no values. */
export function eqAny(field: FilterField, values: readonly FilterValue[]): Filter | undefined {
  return or(...values.map((v) => eq(field, v)));
}

// ── Inspection ────────────────────────────────────────────────────────

/** Every value the filter compares `field` against. */
export function valuesFor(filter: Filter, field: FilterField): FilterValue[] {
  switch (filter.op) {
    case "eq":
      return filter.field === field ? [filter.value] : [];
    case "in":
      return filter.field === field ? [...filter.values] : [];
    case "and":
    case "or":
      return filter.filters.flatMap((f) => valuesFor(f, field));
  }
}

/** Render the filter DSL, e.g. `(post_type:"post" OR post_type:"page") AND site_url:"https://a.test/"`. */
export function formatFilter(filter: Filter): string {
  const quote = (v: FilterValue) => (typeof v === "number" ? String(v) : JSON.stringify(v));
  const group = (f: Filter) => (f.op === "and" || f.op === "or" ? `(${formatFilter(f)})` : formatFilter(f));

  switch (filter.op) {
    case "eq":
      return `${filter.field}:${quote(filter.value)}`;
    case "in":
      return filter.values.length === 0
        ? "FALSE"
        : `(${filter.values.map((v) => `${filter.field}:${quote(v)}`).join(" OR ")})`;
    case "and":
      return filter.filters.map(group).join(" AND ");
    case "or":
      return filter.filters.map(group).join(" OR ");
  }
}
