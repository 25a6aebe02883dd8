import { beforeEach, describe, expect, it, vi } from "vitest";
import { findOrCreateCart, selectVariant } from "../../src/services/cart.js";
import { ownerFilter } from "../../src/services/owner.js";
import { duplicateKeyError } from "./fakeQuery.js";

const { CartModel } = vi.hoisted(() => ({ CartModel: { findOne: vi.fn(), findOneAndUpdate: vi.fn() } }));

vi.mock("../../src/models/cart.js", () => ({ CartModel }));

const variants = [
  { _id: "v1", color: "Navy", size: "S", available: true, stock: 1 },
  { _id: "v2", color: "Navy", size: "M", available: false, stock: 9 },
  { _id: "v3", color: "White", size: "M", available: true, stock: 5 }
];

const emptyCart = () => 0;

describe("selectVariant", () => {
  it("takes the first available variant with enough stock", () => {
    expect(selectVariant(variants, { quantity: 1 }, emptyCart)._id).toBe("v1");
    expect(selectVariant(variants, { quantity: 2 }, emptyCart)._id).toBe("v3");
  });

  it("counts what is already in the cart", () => {
    const inCart = (variantId: string) => (variantId === "v1" ? 1 : 0);
    expect(selectVariant(variants, { quantity: 1 }, inCart)._id).toBe("v3");
  });

  it("honours a requested variant", () => {
    expect(selectVariant(variants, { quantity: 1, variantId: "v3" }, emptyCart)._id).toBe("v3");
  });

  it("rejects an unavailable or unknown variant", () => {
    expect(() => selectVariant(variants, { quantity: 1, variantId: "v2" }, emptyCart)).toThrow("Variant not found.");
    expect(() => selectVariant(variants, { quantity: 1, variantId: "nope" }, emptyCart)).toThrow("Variant not found.");
  });

  it("refuses more than the stock", () => {
    expect(() => selectVariant(variants, { quantity: 6 }, emptyCart)).toThrow("Not enough stock available.");
    expect(() => selectVariant(variants, { quantity: 5, variantId: "v3" }, () => 1)).toThrow(
      "Not enough stock available."
    );
  });
});

describe("ownerFilter", () => {
  it("prefers the signed-in user", () => {
    expect(ownerFilter({ userId: "u1", sessionId: "s1", email: null, displayName: null })).toEqual({ userId: "u1" });
  });

  it("falls back to the session", () => {
    expect(ownerFilter({ userId: null, sessionId: "s1", email: null, displayName: null })).toEqual({
      userId: null,
      sessionId: "s1"
    });
  });

  it("has no owner without either", () => {
    expect(ownerFilter({ userId: null, sessionId: null, email: null, displayName: null })).toBeNull();
  });
});

describe("findOrCreateCart", () => {
  const cart = { lines: [] };

  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("upserts the owner's cart in one step", async () => {
    CartModel.findOneAndUpdate.mockResolvedValue(cart);

    await expect(findOrCreateCart({ userId: null, sessionId: "s1" })).resolves.toBe(cart);
    expect(CartModel.findOneAndUpdate).toHaveBeenCalledWith(
      { userId: null, sessionId: "s1" },
      { $setOnInsert: { lines: [] } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    );
    expect(CartModel.findOne).not.toHaveBeenCalled();
  });

  it("reads back the cart a concurrent request created", async () => {
    CartModel.findOneAndUpdate.mockRejectedValue(duplicateKeyError());
    CartModel.findOne.mockResolvedValue(cart);

    await expect(findOrCreateCart({ userId: "u1" })).resolves.toBe(cart);
    expect(CartModel.findOne).toHaveBeenCalledWith({ userId: "u1" });
  });

  it("passes other database errors on", async () => {
    CartModel.findOneAndUpdate.mockRejectedValue(new Error("connection reset"));

    await expect(findOrCreateCart({ userId: "u1" })).rejects.toThrow("connection reset");
    expect(CartModel.findOne).not.toHaveBeenCalled();
  });
});
