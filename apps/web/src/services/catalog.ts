import type { SearchResult, VariantRow } from "@shopfront/shared-types";
import { BrandModel, CategoryModel, FitTypeModel, ProductModel, SubCategoryModel } from "../models/catalog.js";
import type { ListingFilters } from "../utils/listingFilters.js";
import { sortSpec } from "../utils/listingFilters.js";
import { notFound } from "../utils/httpError.js";
import { toObjectId } from "../utils/ids.js";
import { paginate } from "../utils/pagination.js";
import { effectivePrice, formatPlainPrice, variantPrice } from "../utils/pricing.js";
import { productUrl, sortImages, toProductCard } from "../utils/productCard.js";
import { containsInsensitive } from "../utils/regex.js";
import type {
  CategoryLink,
  CategoryListing,
  HomeSections,
  ListingHeading,
  ProductCard,
  ProductDetail,
  VariantOption
} from "../views/viewModels.js";

const VISIBLE = { active: true, available: true } as const;
const SEARCH_LIMIT = 10;
export const MIN_SEARCH_LENGTH = 2;

const CARD_FIELDS = {
  slug: 1,
  name: 1,
  price: 1,
  salePrice: 1,
  isNewArrival: 1,
  isBestSeller: 1,
  images: 1,
  variants: 1
} as const;

type CategorySource = {
  _id: { toString(): string };
  name: string;
  slug: string;
  imageUrl?: string | null;
};

export function categoryUrl(slug: string) {
  return `/category/${encodeURIComponent(slug)}`;
}

export function subcategoryUrl(categorySlug: string, slug: string) {
  return `${categoryUrl(categorySlug)}/${encodeURIComponent(slug)}`;
}

function toCategoryLink(category: CategorySource, url = categoryUrl(category.slug)): CategoryLink {
  return {
    id: category._id.toString(),
    name: category.name,
    slug: category.slug,
    url,
    imageUrl: category.imageUrl ?? null
  };
}

function distinct(values: string[]) {
  return [...new Set(values)];
}

function sortedStrings(values: unknown[]) {
  return values
    .filter((value): value is string => typeof value === "string" && value.length > 0)
    .sort((a, b) => a.localeCompare(b));
}

async function visibleCards(filter: Record<string, unknown>, limit: number): Promise<ProductCard[]> {
  const products = await ProductModel.find({ ...filter, ...VISIBLE })
    .sort({ createdAt: -1 })
    .limit(limit)
    .select(CARD_FIELDS)
    .lean();
  return products.map((product) => toProductCard(product));
}

export async function getHomeSections(limit: number): Promise<HomeSections> {
  const [featured, newArrivals, bestSellers, sale] = await Promise.all([
    visibleCards({ isFeatured: true }, limit),
    visibleCards({ isNewArrival: true }, limit),
    visibleCards({ isBestSeller: true }, limit),
    visibleCards({ isOnSale: true }, limit)
  ]);
  return { featured, newArrivals, bestSellers, sale };
}

export async function listCategories(): Promise<CategoryLink[]> {
  const categories = await CategoryModel.find({ active: true })
    .sort({ name: 1 })
    .select({ name: 1, slug: 1, imageUrl: 1 })
    .lean();
  return categories.map((category) => toCategoryLink(category));
}

/**
 * One page of a category, or of a subcategory when `subcategorySlug` is given.
 * A filter naming an unknown brand, subcategory or fit type matches nothing.
 */
export async function getCategoryListing(
  slug: string,
  filters: ListingFilters,
  pageSize: number,
  subcategorySlug?: string
): Promise<CategoryListing> {
  const category = await CategoryModel.findOne({ slug, active: true }).lean();
  if (!category) {
    throw notFound("Category not found.");
  }

  const subcategories = await SubCategoryModel.find({ categoryId: category._id, active: true }).sort({ name: 1 }).lean();
  const current = subcategorySlug ? subcategories.find((candidate) => candidate.slug === subcategorySlug) : undefined;
  if (subcategorySlug && !current) {
    throw notFound("Subcategory not found.");
  }

  const base: Record<string, unknown> = { categoryId: category._id, ...VISIBLE };
  if (current) {
    base.subcategoryId = current._id;
  }
  const query: Record<string, unknown> = { ...base };
  let matchesNothing = false;

  if (filters.subcategory) {
    const picked = subcategories.find((candidate) => candidate.slug === filters.subcategory);
    if (picked && (!current || picked._id.equals(current._id))) {
      query.subcategoryId = picked._id;
    } else {
      matchesNothing = true;
    }
  }
  if (filters.fitType) {
    const fitType = await FitTypeModel.findOne({ slug: filters.fitType, active: true }).select({ _id: 1 }).lean();
    if (fitType) {
      query.fitTypeId = fitType._id;
    } else {
      matchesNothing = true;
    }
  }
  if (filters.brand) {
    const brand = await BrandModel.findOne({ slug: filters.brand, active: true }).select({ _id: 1 }).lean();
    if (brand) {
      query.brandId = brand._id;
    } else {
      matchesNothing = true;
    }
  }
  if (filters.color) {
    query["variants.color"] = containsInsensitive(filters.color);
  }
  if (filters.size) {
    query["variants.size"] = containsInsensitive(filters.size);
  }

  const price: Record<string, number> = {};
  if (filters.minPrice !== undefined) {
    price.$gte = filters.minPrice;
  }
  if (filters.maxPrice !== undefined) {
    price.$lte = filters.maxPrice;
  }
  if (Object.keys(price).length > 0) {
    query.price = price;
  }

  const totalItems = matchesNothing ? 0 : await ProductModel.countDocuments(query);
  const pagination = paginate(totalItems, filters.page, pageSize);

  const [products, brands, fitTypes, colors, sizes, ranges] = await Promise.all([
    matchesNothing
      ? Promise.resolve([])
      : ProductModel.find(query)
          .sort(sortSpec(filters.sort))
          .skip(pagination.offset)
          .limit(pageSize)
          .select(CARD_FIELDS)
          .lean(),
    BrandModel.find({ active: true }).sort({ name: 1 }).select({ name: 1, slug: 1 }).lean(),
    FitTypeModel.find({ active: true }).sort({ name: 1 }).select({ name: 1, slug: 1 }).lean(),
    ProductModel.distinct("variants.color", base),
    ProductModel.distinct("variants.size", base),
    ProductModel.aggregate<{ min: number; max: number }>([
      { $match: base },
      { $group: { _id: null, min: { $min: "$price" }, max: { $max: "$price" } } }
    ])
  ]);

  const heading: ListingHeading = { ...toCategoryLink(category), description: category.description };
  const subcategoryHeading: ListingHeading | null = current
    ? { ...toCategoryLink(current, subcategoryUrl(category.slug, current.slug)), description: current.description }
    : null;

  return {
    category: heading,
    subcategory: subcategoryHeading,
    url: subcategoryHeading?.url ?? heading.url,
    products: products.map((product) => toProductCard(product)),
    pagination,
    subcategories: subcategories.map((subcategory) =>
      toCategoryLink(subcategory, subcategoryUrl(category.slug, subcategory.slug))
    ),
    brands: brands.map((brand) => ({ name: brand.name, slug: brand.slug })),
    fitTypes: fitTypes.map((fitType) => ({ name: fitType.name, slug: fitType.slug })),
    colors: sortedStrings(colors),
    sizes: sortedStrings(sizes),
    priceRange: ranges[0] ? { min: ranges[0].min, max: ranges[0].max } : null,
    filters
  };
}

export async function getProductDetail(slug: string, relatedLimit: number): Promise<ProductDetail> {
  const product = await ProductModel.findOne({ slug, ...VISIBLE }).lean();
  if (!product) {
    throw notFound("Product not found.");
  }

  const [category, brand, related] = await Promise.all([
    CategoryModel.findOne({ _id: product.categoryId, active: true }).lean(),
    product.brandId ? BrandModel.findOne({ _id: product.brandId }).lean() : Promise.resolve(null),
    ProductModel.find({ ...VISIBLE, categoryId: product.categoryId, _id: { $ne: product._id } })
      .sort({ createdAt: -1 })
      .limit(relatedLimit)
      .select(CARD_FIELDS)
      .lean()
  ]);

  const variants: VariantOption[] = product.variants
    .filter((variant) => variant.available)
    .map((variant) => ({
      id: variant._id.toString(),
      color: variant.color,
      size: variant.size,
      sku: variant.sku,
      stock: variant.stock,
      price: variantPrice(product, variant)
    }));
  const inStock = variants.filter((variant) => variant.stock > 0);

  return {
    card: toProductCard(product),
    description: product.description,
    shortDescription: product.shortDescription,
    brandName: brand?.name ?? null,
    category: category ? toCategoryLink(category) : null,
    images: sortImages(product.images).map((image) => ({ url: image.url, alt: image.altText || product.name })),
    variants,
    colors: distinct(inStock.map((variant) => variant.color)),
    sizes: distinct(inStock.map((variant) => variant.size)),
    related: related.map((item) => toProductCard(item))
  };
}

async function findSearchMatches(term: string) {
  const pattern = containsInsensitive(term);
  const [brands, categories] = await Promise.all([
    BrandModel.find({ name: pattern }).select({ _id: 1 }).lean(),
    CategoryModel.find({ name: pattern }).select({ _id: 1 }).lean()
  ]);

  return ProductModel.find({
    ...VISIBLE,
    $or: [
      { name: pattern },
      { description: pattern },
      { brandId: { $in: brands.map((brand) => brand._id) } },
      { categoryId: { $in: categories.map((category) => category._id) } }
    ]
  })
    .sort({ name: 1 })
    .limit(SEARCH_LIMIT)
    .lean();
}

export async function searchProducts(query: string): Promise<SearchResult[]> {
  const term = query.trim();
  if (term.length < MIN_SEARCH_LENGTH) {
    return [];
  }

  const products = await findSearchMatches(term);
  const brandIds = products.flatMap((product) => (product.brandId ? [product.brandId] : []));
  const [categories, brands] = await Promise.all([
    CategoryModel.find({ _id: { $in: products.map((product) => product.categoryId) } }).select({ name: 1 }).lean(),
    BrandModel.find({ _id: { $in: brandIds } }).select({ name: 1 }).lean()
  ]);
  const categoryNames = new Map(categories.map((category) => [category._id.toString(), category.name]));
  const brandNames = new Map(brands.map((brand) => [brand._id.toString(), brand.name]));

  return products.map((product) => ({
    id: product._id.toString(),
    name: product.name,
    price: formatPlainPrice(effectivePrice(product)),
    url: productUrl(product.slug),
    image: toProductCard(product).mainImage?.url ?? "",
    category: categoryNames.get(product.categoryId.toString()) ?? "",
    brand: product.brandId ? (brandNames.get(product.brandId.toString()) ?? "") : ""
  }));
}

export async function searchProductCards(query: string): Promise<ProductCard[]> {
  const term = query.trim();
  if (term.length < MIN_SEARCH_LENGTH) {
    return [];
  }
  const products = await findSearchMatches(term);
  return products.map((product) => toProductCard(product));
}

export async function getProductVariants(productId: string, color?: string, size?: string): Promise<VariantRow[]> {
  const product = await ProductModel.findOne({ _id: toObjectId(productId, "product id") }).lean();
  if (!product) {
    throw notFound("Product not found.");
  }

  const wantedColor = color?.toLowerCase();
  const wantedSize = size?.toLowerCase();

  return product.variants
    .filter((variant) => variant.available)
    .filter((variant) => !wantedColor || variant.color.toLowerCase() === wantedColor)
    .filter((variant) => !wantedSize || variant.size.toLowerCase() === wantedSize)
    .map((variant) => ({
      id: variant._id.toString(),
      color: variant.color,
      size: variant.size,
      price: formatPlainPrice(variantPrice(product, variant)),
      stock: variant.stock,
      sku: variant.sku
    }));
}
