import { SiteSettingsModel } from "../models/siteSettings.js";
import { isDuplicateKeyError } from "../utils/dbErrors.js";
import type { SiteSettingsView } from "../views/viewModels.js";

const SETTINGS_KEY = "default";

async function loadOrCreateSettings() {
  const existing = await SiteSettingsModel.findOne({ key: SETTINGS_KEY }).lean();
  if (existing) {
    return existing;
  }
  try {
    return (await SiteSettingsModel.create({ key: SETTINGS_KEY })).toObject();
  } catch (error) {
    // Another request created the document first.
    if (!isDuplicateKeyError(error)) {
      throw error;
    }
  }
  const created = await SiteSettingsModel.findOne({ key: SETTINGS_KEY }).lean();
  if (!created) {
    throw new Error("Site settings could not be loaded.");
  }
  return created;
}

export async function getSiteSettings(): Promise<SiteSettingsView> {
  const settings = await loadOrCreateSettings();

  return {
    showHomeSlider: settings.showHomeSlider,
    showCategoryCarousel: settings.showCategoryCarousel,
    showFeatured: settings.showFeatured,
    showNewArrivals: settings.showNewArrivals,
    showBestSellers: settings.showBestSellers,
    showSaleProducts: settings.showSaleProducts,
    shippingThreshold: settings.shippingThreshold,
    shippingRateLocal: settings.shippingRateLocal,
    shippingRateRemote: settings.shippingRateRemote,
    announcement: settings.announcement
  };
}
