import { describe, expect, it } from "vitest";
import {
  cartTotals,
  discountPercentage,
  effectivePrice,
  formatMoney,
  formatPlainPrice,
  orderGrandTotal,
  parseShippingZone,
  variantPrice
} from "../../src/utils/pricing.js";

const settings = { shippingThreshold: 1500, shippingRateLocal: 50, shippingRateRemote: 85 };

describe("effectivePrice", () => {
  it("uses the sale price only when it undercuts the list price", () => {
    expect(effectivePrice({ price: 100, salePrice: 80 })).toBe(80);
    expect(effectivePrice({ price: 100, salePrice: 120 })).toBe(100);
    expect(effectivePrice({ price: 100, salePrice: null })).toBe(100);
    expect(effectivePrice({ price: 100, salePrice: 0 })).toBe(100);
  });
});

describe("discountPercentage", () => {
  it("rounds to the nearest whole percent", () => {
    expect(discountPercentage({ price: 1599, salePrice: 1199 })).toBe(25);
  });

  it("is zero when the product is not on sale", () => {
    expect(discountPercentage({ price: 1599 })).toBe(0);
  });
});

describe("variantPrice", () => {
  it("adds the variant adjustment to the effective price", () => {
    expect(variantPrice({ price: 100, salePrice: 80 }, { priceAdjustment: 15.5 })).toBe(95.5);
    expect(variantPrice({ price: 100 }, {})).toBe(100);
  });
});

describe("cartTotals", () => {
  it("ships an empty cart for free", () => {
    expect(cartTotals([], settings)).toEqual({
      totalItems: 0,
      subtotal: 0,
      shippingCost: 0,
      grandTotal: 0,
      shippingMessage: "Free (No Items)"
    });
  });

  it("waives shipping once the threshold is met", () => {
    expect(cartTotals([{ quantity: 2, unitPrice: 800 }], settings, null)).toEqual({
      totalItems: 2,
      subtotal: 1600,
      shippingCost: 0,
      grandTotal: 1600,
      shippingMessage: "Free (Threshold Met)"
    });
  });

  it("estimates with the local rate when no zone is known", () => {
    const totals = cartTotals([{ quantity: 1, unitPrice: 899 }], settings);
    expect(totals.shippingCost).toBe(50);
    expect(totals.shippingMessage).toBe("Shipping (Estimate)");
    expect(totals.grandTotal).toBe(949);
  });

  it("charges the zone rate without a message when the zone is known", () => {
    const remote = cartTotals([{ quantity: 1, unitPrice: 899 }], settings, "remote");
    expect(remote.shippingCost).toBe(85);
    expect(remote.shippingMessage).toBe("");
    expect(remote.grandTotal).toBe(984);

    const local = cartTotals([{ quantity: 1, unitPrice: 899 }], settings, "local");
    expect(local.shippingCost).toBe(50);
    expect(local.shippingMessage).toBe("");
  });

  it("rounds the subtotal to cents", () => {
    expect(cartTotals([{ quantity: 3, unitPrice: 0.1 }], settings).subtotal).toBe(0.3);
  });
});

describe("orderGrandTotal", () => {
  it("never goes below zero", () => {
    expect(orderGrandTotal(100, 50, 30)).toBe(120);
    expect(orderGrandTotal(100, 50, 200)).toBe(0);
  });
});

describe("formatting", () => {
  it("formats money with two decimals", () => {
    expect(formatMoney(1234.5, "USD")).toBe("$1,234.50");
    expect(formatPlainPrice(899)).toBe("899.00");
  });

  it("parses known shipping zones only", () => {
    expect(parseShippingZone("local")).toBe("local");
    expect(parseShippingZone("remote")).toBe("remote");
    expect(parseShippingZone("moon")).toBeNull();
    expect(parseShippingZone(undefined)).toBeNull();
  });
});
