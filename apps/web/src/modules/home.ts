import { Router } from "express";
import { env } from "../config/env.js";
import { currentShopper, type ShopperRequest } from "../middleware/shopper.js";
import { getHomeSections } from "../services/catalog.js";
import { loadPageContext } from "../services/layout.js";
import { listActiveSliders } from "../services/sliders.js";
import { sendPage } from "../utils/render.js";
import HomePage from "../views/pages/HomePage.js";

export const homeRouter = Router();

homeRouter.get("/", async (req: ShopperRequest, res) => {
  const [{ layout, settings }, sliders, sections] = await Promise.all([
    loadPageContext(currentShopper(req), req.path),
    listActiveSliders(),
    getHomeSections(env.HOME_SECTION_LIMIT)
  ]);

  sendPage(res, HomePage, { context: layout, flags: settings, sliders, sections });
});
