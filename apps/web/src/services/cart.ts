import { CartModel } from "../models/cart.js";
import { ProductModel } from "../models/catalog.js";
import { isDuplicateKeyError } from "../utils/dbErrors.js";
import { HttpError, notFound } from "../utils/httpError.js";
import { parseObjectId } from "../utils/ids.js";
import { cartTotals, variantPrice, type ShippingSettings, type ShippingZone } from "../utils/pricing.js";
import { productUrl, toProductCard } from "../utils/productCard.js";
import type { CartLineView, CartView } from "../views/viewModels.js";
import { ownerFilter, type OwnerFilter, type Shopper } from "./owner.js";

export type AddToCartInput = {
  productId: string;
  quantity: number;
  variantId?: string;
};

function requireOwner(shopper: Shopper) {
  const owner = ownerFilter(shopper);
  if (!owner) {
    throw new HttpError(400, "BAD_REQUEST", "Shopping session missing.");
  }
  return owner;
}

/** The owner's cart, created on first use. */
export async function findOrCreateCart(owner: OwnerFilter) {
  try {
    const cart = await CartModel.findOneAndUpdate(
      owner,
      { $setOnInsert: { lines: [] } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    );
    if (cart) {
      return cart;
    }
  } catch (error) {
    // Two first requests for the same owner can both try the insert.
    if (!isDuplicateKeyError(error)) {
      throw error;
    }
  }

  const cart = await CartModel.findOne(owner);
  if (!cart) {
    throw new Error("Cart could not be created.");
  }
  return cart;
}

function notEnoughStock() {
  return new HttpError(409, "CONFLICT", "Not enough stock available.");
}

type StockedVariant = {
  _id: { toString(): string };
  available: boolean;
  stock: number;
};

/**
 * Picks the requested variant, or without one the first that can take `quantity`
 * more units on top of what is already in the cart.
 */
export function selectVariant<V extends StockedVariant>(
  variants: readonly V[],
  request: Pick<AddToCartInput, "quantity" | "variantId">,
  quantityInCart: (variantId: string) => number
): V {
  const fits = (candidate: V) => candidate.stock >= request.quantity + quantityInCart(candidate._id.toString());
  const variant = request.variantId
    ? variants.find((candidate) => candidate.available && candidate._id.toString() === request.variantId)
    : variants.find((candidate) => candidate.available && fits(candidate));

  if (!variant) {
    throw request.variantId ? notFound("Variant not found.") : notEnoughStock();
  }
  if (!fits(variant)) {
    throw notEnoughStock();
  }
  return variant;
}

export async function getCartCount(shopper: Shopper) {
  const owner = ownerFilter(shopper);
  if (!owner) {
    return 0;
  }
  const cart = await CartModel.findOne(owner).select({ lines: 1 }).lean();
  return (cart?.lines ?? []).reduce((acc, line) => acc + line.quantity, 0);
}

export async function addToCart(shopper: Shopper, input: AddToCartInput) {
  const owner = requireOwner(shopper);
  const productId = parseObjectId(input.productId);
  const product = productId ? await ProductModel.findOne({ _id: productId, active: true, available: true }) : null;
  if (!product) {
    throw notFound("Product not found.");
  }

  const cart = await findOrCreateCart(owner);
  const quantityInCart = (variantId: string) =>
    cart.lines
      .filter((line) => line.variantId.toString() === variantId)
      .reduce((acc, line) => acc + line.quantity, 0);

  const variant = selectVariant(product.variants, input, quantityInCart);

  const existing = cart.lines.find((line) => line.variantId.toString() === variant._id.toString());
  if (existing) {
    existing.quantity += input.quantity;
  } else {
    cart.lines.push({ productId: product._id, variantId: variant._id, quantity: input.quantity });
  }
  await cart.save();

  return { cartCount: cart.lines.reduce((acc, line) => acc + line.quantity, 0) };
}

export async function getCart(shopper: Shopper, settings: ShippingSettings, zone: ShippingZone | null): Promise<CartView> {
  const owner = ownerFilter(shopper);
  const cart = owner ? await CartModel.findOne(owner).lean() : null;
  const lines = cart?.lines ?? [];

  const products = await ProductModel.find({ _id: { $in: lines.map((line) => line.productId) } }).lean();
  const productMap = new Map(products.map((product) => [product._id.toString(), product]));

  // Lines whose product or variant has since been removed are left out.
  const views: CartLineView[] = lines.flatMap((line) => {
    const product = productMap.get(line.productId.toString());
    const variant = product?.variants.find((candidate) => candidate._id.toString() === line.variantId.toString());
    if (!product || !variant) {
      return [];
    }
    const unitPrice = variantPrice(product, variant);
    return [
      {
        id: line._id.toString(),
        productId: product._id.toString(),
        name: product.name,
        url: productUrl(product.slug),
        image: toProductCard(product).mainImage,
        color: variant.color,
        size: variant.size,
        sku: variant.sku,
        quantity: line.quantity,
        unitPrice,
        lineTotal: Math.round(unitPrice * line.quantity * 100) / 100
      }
    ];
  });

  return { lines: views, totals: cartTotals(views, settings, zone), zone };
}

export async function updateCartLine(shopper: Shopper, lineId: string, quantity: number) {
  if (quantity <= 0) {
    await removeCartLine(shopper, lineId);
    return;
  }

  const owner = requireOwner(shopper);
  const cart = await CartModel.findOne(owner);
  const line = cart?.lines.id(lineId);
  if (!cart || !line) {
    throw notFound("Cart line not found.");
  }

  const product = await ProductModel.findOne({ _id: line.productId }).lean();
  const variant = product?.variants.find((candidate) => candidate._id.toString() === line.variantId.toString());
  if (!variant || variant.stock < quantity) {
    throw notEnoughStock();
  }

  line.quantity = quantity;
  await cart.save();
}

export async function removeCartLine(shopper: Shopper, lineId: string) {
  const owner = requireOwner(shopper);
  const cart = await CartModel.findOne(owner);
  const line = cart?.lines.id(lineId);
  if (!cart || !line) {
    throw notFound("Cart line not found.");
  }
  cart.lines.pull({ _id: line._id });
  await cart.save();
}
