import cookieParser from "cookie-parser";
import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { createRequire } from "module";
import path from "path";
import { env } from "./config/env.js";
import { issueCsrfToken } from "./middleware/csrf.js";
import { errorHandler, notFoundHandler } from "./middleware/errors.js";
import { resolveShopper } from "./middleware/shopper.js";
import { apiRouter, pagesRouter } from "./router.js";

// The carousel library is served straight from its installed package.
const swiperDir = path.dirname(createRequire(import.meta.url).resolve("swiper"));

export function createApp() {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          imgSrc: ["'self'", "data:", "https:"]
        }
      }
    })
  );
  app.use(cors({ origin: env.CORS_ORIGIN === "*" ? "*" : env.CORS_ORIGIN.split(","), credentials: env.CORS_ORIGIN !== "*" }));
  app.use(express.json({ limit: "100kb" }));
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  const staticOptions = { maxAge: env.STATIC_CACHE_SECONDS * 1000 };
  app.use("/static", express.static(env.PUBLIC_DIR, staticOptions));
  app.use("/vendor/swiper", express.static(swiperDir, staticOptions));

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service: "web", timestamp: new Date().toISOString() });
  });

  app.use(resolveShopper);
  app.use(issueCsrfToken);
  app.use("/api", apiRouter);
  app.use(pagesRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
