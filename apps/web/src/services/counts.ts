import { getCartCount } from "./cart.js";
import type { Shopper } from "./owner.js";
import { countWishlist } from "./wishlist.js";

export type Counts = {
  cartCount: number;
  wishlistCount: number;
};

export async function getCounts(shopper: Shopper): Promise<Counts> {
  const [cartCount, wishlistCount] = await Promise.all([getCartCount(shopper), countWishlist(shopper)]);
  return { cartCount, wishlistCount };
}
