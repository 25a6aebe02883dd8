import type { Response } from "express";
import { createElement, type ComponentType } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { env } from "../config/env.js";
import type { Shopper } from "../services/owner.js";
import type { LayoutContext } from "../views/viewModels.js";

export function renderDocument<P extends object>(component: ComponentType<P>, props: P) {
  return `<!DOCTYPE html>${renderToStaticMarkup(createElement(component, props))}`;
}

export function sendPage<P extends object>(res: Response, component: ComponentType<P>, props: P, status = 200) {
  res.status(status).type("html").send(renderDocument(component, props));
}

// Used where the catalog cannot be loaded, such as the error page.
export function bareLayoutContext(shopper: Shopper, currentPath: string): LayoutContext {
  return {
    currentPath,
    categories: [],
    cartCount: 0,
    wishlistCount: 0,
    wishlistedIds: new Set(),
    signedIn: Boolean(shopper.userId),
    displayName: shopper.displayName,
    announcement: "",
    currency: env.CURRENCY
  };
}
