import { Router } from "express";
import { wishlistMutationSchema, type WishlistResponse, type WishlistStatus } from "@shopfront/shared-types";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import { loadPageContext } from "../services/layout.js";
import { addToWishlist, countWishlist, listWishlist, removeFromWishlist } from "../services/wishlist.js";
import { sendPage } from "../utils/render.js";
import WishlistPage from "../views/pages/WishlistPage.js";

export const wishlistPagesRouter = Router();
export const wishlistApiRouter = Router();

const MESSAGES: Record<WishlistStatus, string> = {
  added: "Added to wishlist.",
  exists: "Already in your wishlist.",
  removed: "Removed from wishlist.",
  not_found: "This product was not in your wishlist.",
  error: "Product not provided."
};

function invalidPayload(message: string): WishlistResponse {
  return { success: false, status: "error", message };
}

wishlistPagesRouter.get("/wishlist", async (req: ShopperRequest, res) => {
  const shopper = currentShopper(req);
  const [products, { layout }] = await Promise.all([listWishlist(shopper), loadPageContext(shopper, req.path)]);
  sendPage(res, WishlistPage, { context: layout, products });
});

wishlistApiRouter.post("/add", async (req: ShopperRequest, res) => {
  const parsed = wishlistMutationSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json(invalidPayload(parsed.error.issues[0]?.message ?? MESSAGES.error));
    return;
  }

  const shopper = currentShopper(req);
  const status = await addToWishlist(shopper, parsed.data.product_id);
  const body: WishlistResponse = {
    success: true,
    status,
    message: MESSAGES[status],
    wishlist_count: await countWishlist(shopper)
  };
  res.json(body);
});

// Removing a product that is not wishlisted still leaves the shopper in the state they asked for.
wishlistApiRouter.post("/remove", async (req: ShopperRequest, res) => {
  const parsed = wishlistMutationSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json(invalidPayload(parsed.error.issues[0]?.message ?? MESSAGES.error));
    return;
  }

  const shopper = currentShopper(req);
  const status = await removeFromWishlist(shopper, parsed.data.product_id);
  const body: WishlistResponse = {
    success: true,
    status,
    message: MESSAGES[status],
    wishlist_count: await countWishlist(shopper)
  };
  res.json(body);
});
