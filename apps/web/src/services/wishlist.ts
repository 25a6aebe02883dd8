import { ProductModel } from "../models/catalog.js";
import { WishlistItemModel } from "../models/wishlist.js";
import { isDuplicateKeyError } from "../utils/dbErrors.js";
import { HttpError, notFound } from "../utils/httpError.js";
import { parseObjectId } from "../utils/ids.js";
import { toProductCard } from "../utils/productCard.js";
import type { ProductCard } from "../views/viewModels.js";
import { ownerFilter, type Shopper } from "./owner.js";

export type WishlistAddResult = "added" | "exists";
export type WishlistRemoveResult = "removed" | "not_found";

function requireOwner(shopper: Shopper) {
  const owner = ownerFilter(shopper);
  if (!owner) {
    throw new HttpError(400, "BAD_REQUEST", "Shopping session missing.");
  }
  return owner;
}

export async function addToWishlist(shopper: Shopper, productId: string): Promise<WishlistAddResult> {
  const owner = requireOwner(shopper);
  const id = parseObjectId(productId);
  const product = id ? await ProductModel.findOne({ _id: id, active: true }).select({ _id: 1 }).lean() : null;
  if (!product) {
    throw notFound("Product not found.");
  }

  if (await WishlistItemModel.exists({ ...owner, productId: product._id })) {
    return "exists";
  }
  try {
    await WishlistItemModel.create({ ...owner, productId: product._id });
  } catch (error) {
    // A concurrent request inserted the same row first.
    if (isDuplicateKeyError(error)) {
      return "exists";
    }
    throw error;
  }
  return "added";
}

export async function removeFromWishlist(shopper: Shopper, productId: string): Promise<WishlistRemoveResult> {
  const owner = requireOwner(shopper);
  const id = parseObjectId(productId);
  if (!id) {
    return "not_found";
  }
  const result = await WishlistItemModel.deleteOne({ ...owner, productId: id });
  return result.deletedCount > 0 ? "removed" : "not_found";
}

export async function countWishlist(shopper: Shopper) {
  const owner = ownerFilter(shopper);
  return owner ? WishlistItemModel.countDocuments(owner) : 0;
}

export async function wishlistProductIds(shopper: Shopper): Promise<Set<string>> {
  const owner = ownerFilter(shopper);
  if (!owner) {
    return new Set();
  }
  const rows = await WishlistItemModel.find(owner).select({ productId: 1 }).lean();
  return new Set(rows.map((row) => row.productId.toString()));
}

export async function listWishlist(shopper: Shopper): Promise<ProductCard[]> {
  const owner = ownerFilter(shopper);
  if (!owner) {
    return [];
  }

  const rows = await WishlistItemModel.find(owner).sort({ createdAt: -1 }).lean();
  const products = await ProductModel.find({ _id: { $in: rows.map((row) => row.productId) }, active: true }).lean();
  const productMap = new Map(products.map((product) => [product._id.toString(), product]));

  return rows.flatMap((row) => {
    const product = productMap.get(row.productId.toString());
    return product ? [toProductCard(product)] : [];
  });
}
