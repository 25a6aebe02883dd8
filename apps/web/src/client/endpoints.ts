// Wire shapes are checked by hand here: the browser bundle ships without zod.

export const ENDPOINTS = {
  counts: "/api/counts",
  wishlistAdd: "/api/wishlist/add",
  wishlistRemove: "/api/wishlist/remove",
  cartAdd: "/api/cart/add"
} as const;

export type CountsPayload = {
  cart_count: number;
  wishlist_count: number;
};

export type WishlistPayload = {
  success: boolean;
  status: string;
  message: string;
  wishlist_count?: number;
};

export type CartPayload = {
  success: boolean;
  message: string;
  cart_count?: number;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function optionalCount(value: unknown) {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readCounts(data: unknown): CountsPayload | null {
  if (!isRecord(data) || typeof data.cart_count !== "number" || typeof data.wishlist_count !== "number") {
    return null;
  }
  return { cart_count: data.cart_count, wishlist_count: data.wishlist_count };
}

export function readWishlistPayload(data: unknown): WishlistPayload | null {
  if (!isRecord(data) || typeof data.success !== "boolean" || typeof data.message !== "string") {
    return null;
  }
  return {
    success: data.success,
    status: typeof data.status === "string" ? data.status : "error",
    message: data.message,
    wishlist_count: optionalCount(data.wishlist_count)
  };
}

export function readCartPayload(data: unknown): CartPayload | null {
  if (!isRecord(data) || typeof data.success !== "boolean" || typeof data.message !== "string") {
    return null;
  }
  return { success: data.success, message: data.message, cart_count: optionalCount(data.cart_count) };
}
