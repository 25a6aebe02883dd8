import { z } from "zod";

export const shopperClaimsSchema = z.object({
  userId: z.string().min(1),
  email: z.string().email(),
  displayName: z.string().min(1)
});

export const MAX_LINE_QUANTITY = 20;

// Templates post numeric ids as numbers and ObjectIds as strings. A missing id
// reads as blank so it reports the same message.
export const productIdSchema = z.preprocess(
  (value) => value ?? "",
  z
    .union([z.string(), z.number().int().nonnegative()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1, "Product not provided."))
);

const quantitySchema = z.coerce
  .number({ invalid_type_error: "Invalid quantity." })
  .int("Invalid quantity.");

export const wishlistMutationSchema = z.object({
  product_id: productIdSchema
});

export const addToCartSchema = z.object({
  product_id: productIdSchema,
  variant_id: z.string().min(1).optional(),
  quantity: quantitySchema
    .min(1, "Quantity must be at least 1.")
    .max(MAX_LINE_QUANTITY, `Quantity must be at most ${MAX_LINE_QUANTITY}.`)
    .default(1)
});

export const cartLineUpdateSchema = z.object({
  quantity: quantitySchema.min(0).max(MAX_LINE_QUANTITY)
});

export const countsResponseSchema = z.object({
  cart_count: z.number().int().nonnegative(),
  wishlist_count: z.number().int().nonnegative()
});

export const wishlistStatusSchema = z.enum(["added", "exists", "removed", "not_found", "error"]);

export const wishlistResponseSchema = z.object({
  success: z.boolean(),
  status: wishlistStatusSchema,
  message: z.string(),
  wishlist_count: z.number().int().nonnegative().optional()
});

export const addToCartResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  cart_count: z.number().int().nonnegative().optional()
});

export const searchResultSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.string(),
  url: z.string(),
  image: z.string(),
  category: z.string(),
  brand: z.string()
});

export const variantRowSchema = z.object({
  id: z.string(),
  color: z.string(),
  size: z.string(),
  price: z.string(),
  stock: z.number().int().nonnegative(),
  sku: z.string()
});

export type ShopperClaims = z.infer<typeof shopperClaimsSchema>;
export type CountsResponse = z.infer<typeof countsResponseSchema>;
export type WishlistStatus = z.infer<typeof wishlistStatusSchema>;
export type WishlistResponse = z.infer<typeof wishlistResponseSchema>;
export type AddToCartResponse = z.infer<typeof addToCartResponseSchema>;
export type SearchResult = z.infer<typeof searchResultSchema>;
export type VariantRow = z.infer<typeof variantRowSchema>;
