import type { ListingFilters } from "../utils/listingFilters.js";
import type { Pagination } from "../utils/pagination.js";
import type { CartTotals, ShippingSettings, ShippingZone } from "../utils/pricing.js";

export type CardImage = {
  url: string;
  alt: string;
};

export type ProductCard = {
  id: string;
  slug: string;
  name: string;
  url: string;
  price: number;
  salePrice: number | null;
  effectivePrice: number;
  isOnSale: boolean;
  discountPercentage: number;
  isNewArrival: boolean;
  isBestSeller: boolean;
  inStock: boolean;
  mainImage: CardImage | null;
  hoverImage: CardImage | null;
};

export type CategoryLink = {
  id: string;
  name: string;
  slug: string;
  url: string;
  imageUrl: string | null;
};

export type FilterOption = {
  name: string;
  slug: string;
};

export type SliderView = {
  id: string;
  imageUrl: string;
  altText: string;
  heading: string;
  subheading: string;
  buttonText: string;
  buttonUrl: string;
};

export type HomeSections = {
  featured: ProductCard[];
  newArrivals: ProductCard[];
  bestSellers: ProductCard[];
  sale: ProductCard[];
};

export type FeatureFlags = {
  showHomeSlider: boolean;
  showCategoryCarousel: boolean;
  showFeatured: boolean;
  showNewArrivals: boolean;
  showBestSellers: boolean;
  showSaleProducts: boolean;
};

export type SiteSettingsView = FeatureFlags &
  ShippingSettings & {
    announcement: string;
  };

export type PriceRange = {
  min: number;
  max: number;
};

export type ListingHeading = CategoryLink & { description: string };

export type CategoryListing = {
  category: ListingHeading;
  subcategory: ListingHeading | null;
  /** Where the filter form and pagination links point. */
  url: string;
  products: ProductCard[];
  pagination: Pagination;
  subcategories: CategoryLink[];
  brands: FilterOption[];
  fitTypes: FilterOption[];
  colors: string[];
  sizes: string[];
  priceRange: PriceRange | null;
  filters: ListingFilters;
};

export type VariantOption = {
  id: string;
  color: string;
  size: string;
  sku: string;
  stock: number;
  price: number;
};

export type ProductDetail = {
  card: ProductCard;
  description: string;
  shortDescription: string;
  brandName: string | null;
  category: CategoryLink | null;
  images: CardImage[];
  variants: VariantOption[];
  colors: string[];
  sizes: string[];
  related: ProductCard[];
};

export type CartLineView = {
  id: string;
  productId: string;
  name: string;
  url: string;
  image: CardImage | null;
  color: string;
  size: string;
  sku: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
};

export type CartView = {
  lines: CartLineView[];
  totals: CartTotals;
  zone: ShippingZone | null;
};

export type OrderStatus = "pending" | "processing" | "shipped" | "delivered" | "cancelled" | "refunded";
export type PaymentStatus = "pending" | "paid" | "failed" | "refunded";

export type OrderRow = {
  id: string;
  orderNumber: string;
  createdAt: Date;
  grandTotal: number;
  status: OrderStatus;
  paymentStatus: PaymentStatus;
  itemCount: number;
};

export type OrderHistory = {
  orders: OrderRow[];
  pagination: Pagination;
};

export type LayoutContext = {
  currentPath: string;
  categories: CategoryLink[];
  cartCount: number;
  wishlistCount: number;
  wishlistedIds: ReadonlySet<string>;
  signedIn: boolean;
  displayName: string | null;
  announcement: string;
  currency: string;
};
