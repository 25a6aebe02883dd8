import { Router } from "express";
import { verifyCsrf } from "./middleware/csrf.js";
import { cartApiRouter, cartPagesRouter } from "./modules/cart.js";
import { catalogApiRouter, catalogPagesRouter } from "./modules/catalog.js";
import { countsRouter } from "./modules/counts.js";
import { homeRouter } from "./modules/home.js";
import { ordersRouter } from "./modules/orders.js";
import { wishlistApiRouter, wishlistPagesRouter } from "./modules/wishlist.js";

export const apiRouter = Router();

apiRouter.use(verifyCsrf);
apiRouter.use(countsRouter);
apiRouter.use(catalogApiRouter);
apiRouter.use("/wishlist", wishlistApiRouter);
apiRouter.use("/cart", cartApiRouter);

export const pagesRouter = Router();

pagesRouter.use(verifyCsrf);
pagesRouter.use(homeRouter);
pagesRouter.use(catalogPagesRouter);
pagesRouter.use(wishlistPagesRouter);
pagesRouter.use(cartPagesRouter);
pagesRouter.use(ordersRouter);
