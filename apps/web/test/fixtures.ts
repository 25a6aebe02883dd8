import { paginate } from "../src/utils/pagination.js";
import type { CartTotals } from "../src/utils/pricing.js";
import type { LayoutContext, ProductCard, SiteSettingsView } from "../src/views/viewModels.js";

export function makeCard(overrides: Partial<ProductCard> = {}): ProductCard {
  return {
    id: "64b000000000000000000001",
    slug: "oxford-shirt",
    name: "Oxford Shirt",
    url: "/product/oxford-shirt",
    price: 899,
    salePrice: null,
    effectivePrice: 899,
    isOnSale: false,
    discountPercentage: 0,
    isNewArrival: false,
    isBestSeller: false,
    inStock: true,
    mainImage: { url: "https://img.test/oxford.jpg", alt: "Oxford Shirt" },
    hoverImage: { url: "https://img.test/oxford.jpg", alt: "Oxford Shirt" },
    ...overrides
  };
}

export function makeLayout(overrides: Partial<LayoutContext> = {}): LayoutContext {
  return {
    currentPath: "/",
    categories: [
      { id: "c1", name: "Men", slug: "men", url: "/category/men", imageUrl: null },
      { id: "c2", name: "Women", slug: "women", url: "/category/women", imageUrl: "https://img.test/women.jpg" }
    ],
    cartCount: 0,
    wishlistCount: 0,
    wishlistedIds: new Set(),
    signedIn: false,
    displayName: null,
    announcement: "",
    currency: "EGP",
    ...overrides
  };
}

export function makeSettings(overrides: Partial<SiteSettingsView> = {}): SiteSettingsView {
  return {
    showHomeSlider: true,
    showCategoryCarousel: true,
    showFeatured: true,
    showNewArrivals: true,
    showBestSellers: true,
    showSaleProducts: true,
    shippingThreshold: 1500,
    shippingRateLocal: 50,
    shippingRateRemote: 85,
    announcement: "",
    ...overrides
  };
}

export const emptyTotals: CartTotals = {
  totalItems: 0,
  subtotal: 0,
  shippingCost: 0,
  grandTotal: 0,
  shippingMessage: "Free (No Items)"
};

export function firstPage(totalItems: number) {
  return paginate(totalItems, 1, 12);
}
