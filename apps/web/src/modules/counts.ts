import { Router } from "express";
import type { CountsResponse } from "@shopfront/shared-types";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import { getCounts } from "../services/counts.js";

export const countsRouter = Router();

countsRouter.get("/counts", async (req: ShopperRequest, res) => {
  const counts = await getCounts(currentShopper(req));
  const body: CountsResponse = { cart_count: counts.cartCount, wishlist_count: counts.wishlistCount };
  res.json(body);
});
