export type PricedProduct = {
  price: number;
  salePrice?: number | null;
};

export type PriceAdjusted = {
  priceAdjustment?: number | null;
};

export type ShippingZone = "local" | "remote";

export type ShippingSettings = {
  shippingThreshold: number;
  shippingRateLocal: number;
  shippingRateRemote: number;
};

export type PricedLine = {
  quantity: number;
  unitPrice: number;
};

export type CartTotals = {
  totalItems: number;
  subtotal: number;
  shippingCost: number;
  grandTotal: number;
  shippingMessage: string;
};

export function roundMoney(amount: number) {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function isSalePrice(price: number, salePrice?: number | null): salePrice is number {
  return typeof salePrice === "number" && salePrice > 0 && salePrice < price;
}

export function effectivePrice(product: PricedProduct) {
  return isSalePrice(product.price, product.salePrice) ? product.salePrice : product.price;
}

export function discountPercentage(product: PricedProduct) {
  if (!isSalePrice(product.price, product.salePrice) || product.price <= 0) {
    return 0;
  }
  return Math.round(((product.price - product.salePrice) / product.price) * 100);
}

export function variantPrice(product: PricedProduct, variant: PriceAdjusted) {
  return roundMoney(effectivePrice(product) + (variant.priceAdjustment ?? 0));
}

export function parseShippingZone(value: unknown): ShippingZone | null {
  return value === "local" || value === "remote" ? value : null;
}

/**
 * Free shipping once the subtotal reaches the threshold; below it the zone's
 * rate applies, falling back to the local rate as an estimate when the zone
 * is unknown.
 */
export function cartTotals(lines: PricedLine[], settings: ShippingSettings, zone?: ShippingZone | null): CartTotals {
  const totalItems = lines.reduce((acc, line) => acc + line.quantity, 0);
  const subtotal = roundMoney(lines.reduce((acc, line) => acc + line.quantity * line.unitPrice, 0));
  const rate = zone === "remote" ? settings.shippingRateRemote : settings.shippingRateLocal;

  let shippingCost = 0;
  let shippingMessage = zone ? "Free" : "Shipping (Estimate)";

  if (totalItems === 0) {
    shippingMessage = "Free (No Items)";
  } else if (subtotal >= settings.shippingThreshold) {
    shippingMessage = "Free (Threshold Met)";
  } else {
    shippingCost = rate;
    if (shippingCost > 0 && shippingMessage === "Free") {
      shippingMessage = "";
    }
  }

  return {
    totalItems,
    subtotal,
    shippingCost,
    grandTotal: roundMoney(subtotal + shippingCost),
    shippingMessage
  };
}

export function orderGrandTotal(subtotal: number, shippingCost: number, discountAmount: number) {
  return Math.max(0, roundMoney(subtotal + shippingCost - discountAmount));
}

export function formatMoney(amount: number, currency: string, locale = "en-US") {
  return new Intl.NumberFormat(locale, {
    style: "currency",
    currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
  }).format(amount);
}

export function formatPlainPrice(amount: number) {
  return amount.toFixed(2);
}
