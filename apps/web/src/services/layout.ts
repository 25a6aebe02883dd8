import { env } from "../config/env.js";
import type { LayoutContext, SiteSettingsView } from "../views/viewModels.js";
import { listCategories } from "./catalog.js";
import { getCounts } from "./counts.js";
import type { Shopper } from "./owner.js";
import { getSiteSettings } from "./settings.js";
import { wishlistProductIds } from "./wishlist.js";

export type PageContext = {
  layout: LayoutContext;
  settings: SiteSettingsView;
};

/** Everything the shared layout and navbar need, loaded once per page. */
export async function loadPageContext(shopper: Shopper, currentPath: string): Promise<PageContext> {
  const [settings, categories, counts, wishlistedIds] = await Promise.all([
    getSiteSettings(),
    listCategories(),
    getCounts(shopper),
    wishlistProductIds(shopper)
  ]);

  return {
    settings,
    layout: {
      currentPath,
      categories,
      cartCount: counts.cartCount,
      wishlistCount: counts.wishlistCount,
      wishlistedIds,
      signedIn: Boolean(shopper.userId),
      displayName: shopper.displayName,
      announcement: settings.announcement,
      currency: env.CURRENCY
    }
  };
}
