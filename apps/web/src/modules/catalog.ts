import { Router } from "express";
import { env } from "../config/env.js";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import {
  getCategoryListing,
  getProductDetail,
  getProductVariants,
  MIN_SEARCH_LENGTH,
  searchProductCards,
  searchProducts
} from "../services/catalog.js";
import { loadPageContext } from "../services/layout.js";
import { parseListingFilters } from "../utils/listingFilters.js";
import { sendPage } from "../utils/render.js";
import CategoryPage from "../views/pages/CategoryPage.js";
import ProductPage from "../views/pages/ProductPage.js";
import SearchPage from "../views/pages/SearchPage.js";

const RELATED_LIMIT = 4;

export const catalogPagesRouter = Router();
export const catalogApiRouter = Router();

function queryText(value: unknown) {
  return typeof value === "string" ? value : "";
}

catalogPagesRouter.get("/category/:slug", async (req: ShopperRequest, res) => {
  const filters = parseListingFilters(req.query);
  const listing = await getCategoryListing(String(req.params.slug), filters, env.PAGE_SIZE);
  const { layout } = await loadPageContext(currentShopper(req), req.path);
  sendPage(res, CategoryPage, { context: layout, listing });
});

catalogPagesRouter.get("/category/:categorySlug/:slug", async (req: ShopperRequest, res) => {
  const filters = parseListingFilters(req.query);
  const listing = await getCategoryListing(
    String(req.params.categorySlug),
    filters,
    env.PAGE_SIZE,
    String(req.params.slug)
  );
  const { layout } = await loadPageContext(currentShopper(req), req.path);
  sendPage(res, CategoryPage, { context: layout, listing });
});

catalogPagesRouter.get("/product/:slug", async (req: ShopperRequest, res) => {
  const detail = await getProductDetail(String(req.params.slug), RELATED_LIMIT);
  const { layout } = await loadPageContext(currentShopper(req), req.path);
  sendPage(res, ProductPage, { context: layout, detail });
});

catalogPagesRouter.get("/search", async (req: ShopperRequest, res) => {
  const query = queryText(req.query.q);
  const [results, { layout }] = await Promise.all([
    searchProductCards(query),
    loadPageContext(currentShopper(req), req.path)
  ]);
  sendPage(res, SearchPage, { context: layout, query, results, minLength: MIN_SEARCH_LENGTH });
});

catalogApiRouter.get("/search", async (req, res) => {
  const results = await searchProducts(queryText(req.query.q));
  res.json({ results });
});

catalogApiRouter.get("/products/:id/variants", async (req, res) => {
  const color = queryText(req.query.color).trim() || undefined;
  const size = queryText(req.query.size).trim() || undefined;
  const variants = await getProductVariants(String(req.params.id), color, size);
  res.json({ variants });
});
