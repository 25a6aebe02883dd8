import { parsePageNumber } from "./pagination.js";

export const SORT_KEYS = ["name", "price_low", "price_high", "newest", "popular"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export type ListingFilters = {
  subcategory?: string;
  fitType?: string;
  brand?: string;
  color?: string;
  size?: string;
  minPrice?: number;
  maxPrice?: number;
  sort: SortKey;
  page: number;
};

export const SORT_LABELS: Record<SortKey, string> = {
  name: "Name",
  price_low: "Price: low to high",
  price_high: "Price: high to low",
  newest: "Newest",
  popular: "Popular"
};

function isSortKey(value: string): value is SortKey {
  return (SORT_KEYS as readonly string[]).includes(value);
}

function parseOptionalText(value: unknown) {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseOptionalNumber(value: unknown) {
  if (value === undefined || value === null) {
    return undefined;
  }
  const raw = String(value).trim();
  if (!raw) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseListingFilters(query: Record<string, unknown>): ListingFilters {
  const sort = parseOptionalText(query.sort);
  return {
    subcategory: parseOptionalText(query.subcategory),
    fitType: parseOptionalText(query.fit_type),
    brand: parseOptionalText(query.brand),
    color: parseOptionalText(query.color),
    size: parseOptionalText(query.size),
    minPrice: parseOptionalNumber(query.min_price),
    maxPrice: parseOptionalNumber(query.max_price),
    sort: sort && isSortKey(sort) ? sort : "name",
    page: parsePageNumber(query.page)
  };
}

export function sortSpec(sort: SortKey): Record<string, 1 | -1> {
  switch (sort) {
    case "price_low":
      return { price: 1, name: 1 };
    case "price_high":
      return { price: -1, name: 1 };
    case "newest":
      return { createdAt: -1 };
    case "popular":
      return { isBestSeller: -1, createdAt: -1 };
    default:
      return { name: 1 };
  }
}

/** Query string for a listing page, keeping the active filters and dropping empty ones. */
export function listingQueryString(filters: ListingFilters, page: number) {
  const params = new URLSearchParams();
  if (filters.subcategory) params.set("subcategory", filters.subcategory);
  if (filters.fitType) params.set("fit_type", filters.fitType);
  if (filters.brand) params.set("brand", filters.brand);
  if (filters.color) params.set("color", filters.color);
  if (filters.size) params.set("size", filters.size);
  if (filters.minPrice !== undefined) params.set("min_price", String(filters.minPrice));
  if (filters.maxPrice !== undefined) params.set("max_price", String(filters.maxPrice));
  if (filters.sort !== "name") params.set("sort", filters.sort);
  if (page > 1) params.set("page", String(page));
  const query = params.toString();
  return query ? `?${query}` : "";
}
