import { Router } from "express";
import { addToCartSchema, cartLineUpdateSchema, type AddToCartResponse } from "@shopfront/shared-types";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import { addToCart, getCart, removeCartLine, updateCartLine } from "../services/cart.js";
import { loadPageContext } from "../services/layout.js";
import { HttpError } from "../utils/httpError.js";
import { parseShippingZone } from "../utils/pricing.js";
import { sendPage } from "../utils/render.js";
import CartPage from "../views/pages/CartPage.js";

export const cartPagesRouter = Router();
export const cartApiRouter = Router();

cartPagesRouter.get("/cart", async (req: ShopperRequest, res) => {
  const shopper = currentShopper(req);
  const { layout, settings } = await loadPageContext(shopper, req.path);
  const cart = await getCart(shopper, settings, parseShippingZone(req.query.zone));
  sendPage(res, CartPage, { context: layout, cart, csrfToken: req.csrfToken ?? "" });
});

cartPagesRouter.post("/cart/lines/:id", async (req: ShopperRequest, res) => {
  const parsed = cartLineUpdateSchema.safeParse(req.body);
  if (!parsed.success) {
    throw new HttpError(400, "BAD_REQUEST", "Quantity must be between 0 and 20.");
  }
  await updateCartLine(currentShopper(req), String(req.params.id), parsed.data.quantity);
  res.redirect(303, "/cart");
});

cartPagesRouter.post("/cart/lines/:id/remove", async (req: ShopperRequest, res) => {
  await removeCartLine(currentShopper(req), String(req.params.id));
  res.redirect(303, "/cart");
});

cartApiRouter.post("/add", async (req: ShopperRequest, res) => {
  const parsed = addToCartSchema.safeParse(req.body);
  if (!parsed.success) {
    const body: AddToCartResponse = { success: false, message: parsed.error.issues[0]?.message ?? "Invalid request." };
    res.status(400).json(body);
    return;
  }

  const { cartCount } = await addToCart(currentShopper(req), {
    productId: parsed.data.product_id,
    quantity: parsed.data.quantity,
    variantId: parsed.data.variant_id
  });
  const body: AddToCartResponse = { success: true, message: "Added to cart.", cart_count: cartCount };
  res.json(body);
});
