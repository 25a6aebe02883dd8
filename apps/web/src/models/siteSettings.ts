import { Schema, model, type InferSchemaType } from "mongoose";

const siteSettingsSchema = new Schema(
  {
    key: { type: String, default: "default", unique: true },
    showHomeSlider: { type: Boolean, default: true },
    showCategoryCarousel: { type: Boolean, default: true },
    showFeatured: { type: Boolean, default: true },
    showNewArrivals: { type: Boolean, default: true },
    showBestSellers: { type: Boolean, default: true },
    showSaleProducts: { type: Boolean, default: true },
    shippingThreshold: { type: Number, default: 1500, min: 0 },
    shippingRateLocal: { type: Number, default: 50, min: 0 },
    shippingRateRemote: { type: Number, default: 85, min: 0 },
    announcement: { type: String, default: "" }
  },
  { timestamps: true }
);

export type SiteSettingsDocument = InferSchemaType<typeof siteSettingsSchema>;
export const SiteSettingsModel = model("SiteSettings", siteSettingsSchema);
