import type { CardImage, ProductCard } from "../views/viewModels.js";
import { discountPercentage, effectivePrice, isSalePrice } from "./pricing.js";

type ImageSource = {
  url: string;
  altText?: string | null;
  isMain?: boolean | null;
  isHover?: boolean | null;
  order?: number | null;
};

type VariantSource = {
  stock: number;
  available?: boolean | null;
};

export type ProductCardSource = {
  _id: { toString(): string };
  slug: string;
  name: string;
  price: number;
  salePrice?: number | null;
  isNewArrival?: boolean | null;
  isBestSeller?: boolean | null;
  images?: readonly ImageSource[] | null;
  variants?: readonly VariantSource[] | null;
};

export function productUrl(slug: string) {
  return `/product/${encodeURIComponent(slug)}`;
}

export function sortImages<T extends ImageSource>(images: readonly T[] | null | undefined): T[] {
  return [...(images ?? [])].sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
}

function toCardImage(image: ImageSource | undefined, productName: string): CardImage | null {
  if (!image) {
    return null;
  }
  return { url: image.url, alt: image.altText?.trim() || productName };
}

export function isVariantInStock(variant: VariantSource) {
  return variant.available !== false && variant.stock > 0;
}

export function toProductCard(product: ProductCardSource): ProductCard {
  const images = sortImages(product.images);
  const main = images.find((image) => image.isMain) ?? images[0];
  const hover = images.find((image) => image.isHover) ?? images[0];
  const onSale = isSalePrice(product.price, product.salePrice);

  return {
    id: product._id.toString(),
    slug: product.slug,
    name: product.name,
    url: productUrl(product.slug),
    price: product.price,
    salePrice: onSale ? (product.salePrice ?? null) : null,
    effectivePrice: effectivePrice(product),
    isOnSale: onSale,
    discountPercentage: discountPercentage(product),
    isNewArrival: Boolean(product.isNewArrival),
    isBestSeller: Boolean(product.isBestSeller),
    inStock: (product.variants ?? []).some(isVariantInStock),
    mainImage: toCardImage(main, product.name),
    hoverImage: toCardImage(hover, product.name)
  };
}
