import { MAX_LINE_QUANTITY } from "@shopfront/shared-types";
import type { Types } from "mongoose";
import { CartModel } from "../models/cart.js";
import { ProductModel } from "../models/catalog.js";
import { WishlistItemModel } from "../models/wishlist.js";
import { isDuplicateKeyError } from "../utils/dbErrors.js";
import { logger } from "../utils/logger.js";
import { findOrCreateCart } from "./cart.js";

async function variantStock(productIds: Types.ObjectId[]) {
  const products = await ProductModel.find({ _id: { $in: productIds } }).select({ variants: 1 }).lean();
  const stock = new Map<string, number>();
  for (const product of products) {
    for (const variant of product.variants) {
      stock.set(variant._id.toString(), variant.available ? variant.stock : 0);
    }
  }
  return stock;
}

export type MergeResult = {
  cartLines: number;
  wishlistItems: number;
};

/**
 * Moves an anonymous session's cart lines and wishlist rows onto a user once
 * they sign in. Quantities for a variant already in the user's cart are
 * added together, capped at the variant's stock and the per-line maximum.
 * Lines whose variant no longer exists are dropped. Running it again for the
 * same session is a no-op.
 */
export async function mergeSessionIntoUser(userId: string, sessionId: string): Promise<MergeResult> {
  const result: MergeResult = { cartLines: 0, wishlistItems: 0 };

  const sessionCart = await CartModel.findOne({ userId: null, sessionId });
  if (sessionCart) {
    if (sessionCart.lines.length > 0) {
      const userCart = await findOrCreateCart({ userId });
      const stockByVariant = await variantStock(sessionCart.lines.map((line) => line.productId));

      for (const line of sessionCart.lines) {
        const variantId = line.variantId.toString();
        const stock = stockByVariant.get(variantId);
        if (stock === undefined) {
          continue;
        }
        const limit = Math.min(MAX_LINE_QUANTITY, stock);
        const existing = userCart.lines.find((candidate) => candidate.variantId.toString() === variantId);
        if (existing) {
          existing.quantity = Math.max(existing.quantity, Math.min(existing.quantity + line.quantity, limit));
        } else if (limit > 0) {
          userCart.lines.push({
            productId: line.productId,
            variantId: line.variantId,
            quantity: Math.min(line.quantity, limit)
          });
        } else {
          continue;
        }
        result.cartLines += 1;
      }
      await userCart.save();
    }
    await sessionCart.deleteOne();
  }

  const sessionItems = await WishlistItemModel.find({ userId: null, sessionId }).lean();
  for (const item of sessionItems) {
    if (await WishlistItemModel.exists({ userId, productId: item.productId })) {
      continue;
    }
    try {
      await WishlistItemModel.create({ userId, sessionId: null, productId: item.productId });
      result.wishlistItems += 1;
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
    }
  }
  if (sessionItems.length > 0) {
    await WishlistItemModel.deleteMany({ userId: null, sessionId });
  }

  if (result.cartLines > 0 || result.wishlistItems > 0) {
    logger.info("session merged", { userId, ...result });
  }
  return result;
}
