import { Router } from "express";
import { env } from "../config/env.js";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import { loadPageContext } from "../services/layout.js";
import { listOrders } from "../services/orders.js";
import { parsePageNumber } from "../utils/pagination.js";
import { sendPage } from "../utils/render.js";
import ErrorPage from "../views/pages/ErrorPage.js";
import OrderHistoryPage from "../views/pages/OrderHistoryPage.js";

export const ordersRouter = Router();

ordersRouter.get("/orders", async (req: ShopperRequest, res) => {
  const shopper = currentShopper(req);
  const { layout } = await loadPageContext(shopper, req.path);

  if (!shopper.userId) {
    sendPage(res, ErrorPage, { context: layout, status: 401, message: "Please sign in to view your orders." }, 401);
    return;
  }

  const history = await listOrders(shopper.userId, parsePageNumber(req.query.page), env.PAGE_SIZE);
  sendPage(res, OrderHistoryPage, { context: layout, history });
});
