import { Types } from "mongoose";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Shopper } from "../../src/services/owner.js";
import { addToWishlist, removeFromWishlist } from "../../src/services/wishlist.js";
import { duplicateKeyError, fakeQuery } from "./fakeQuery.js";

const models = vi.hoisted(() => ({
  ProductModel: { findOne: vi.fn() },
  WishlistItemModel: { exists: vi.fn(), create: vi.fn(), deleteOne: vi.fn() }
}));

vi.mock("../../src/models/catalog.js", () => ({ ProductModel: models.ProductModel }));
vi.mock("../../src/models/wishlist.js", () => ({ WishlistItemModel: models.WishlistItemModel }));

const visitor: Shopper = { userId: null, sessionId: "s1", email: null, displayName: null };
const productId = new Types.ObjectId();

beforeEach(() => {
  vi.resetAllMocks();
  models.ProductModel.findOne.mockReturnValue(fakeQuery({ _id: productId }));
});

describe("addToWishlist", () => {
  it("saves a new row for the session", async () => {
    models.WishlistItemModel.exists.mockResolvedValue(null);
    models.WishlistItemModel.create.mockResolvedValue({});

    await expect(addToWishlist(visitor, productId.toString())).resolves.toBe("added");
    expect(models.WishlistItemModel.create).toHaveBeenCalledWith({ userId: null, sessionId: "s1", productId });
  });

  it("reports a row that is already there", async () => {
    models.WishlistItemModel.exists.mockResolvedValue({ _id: new Types.ObjectId() });

    await expect(addToWishlist(visitor, productId.toString())).resolves.toBe("exists");
    expect(models.WishlistItemModel.create).not.toHaveBeenCalled();
  });

  it("reports a duplicate insert from a concurrent add as existing", async () => {
    models.WishlistItemModel.exists.mockResolvedValue(null);
    models.WishlistItemModel.create.mockRejectedValue(duplicateKeyError());

    await expect(addToWishlist(visitor, productId.toString())).resolves.toBe("exists");
  });

  it("rejects an unknown product", async () => {
    models.ProductModel.findOne.mockReturnValue(fakeQuery(null));

    await expect(addToWishlist(visitor, productId.toString())).rejects.toThrow("Product not found.");
  });

  it("needs a shopper session", async () => {
    const nobody: Shopper = { userId: null, sessionId: null, email: null, displayName: null };

    await expect(addToWishlist(nobody, productId.toString())).rejects.toThrow("Shopping session missing.");
  });
});

describe("removeFromWishlist", () => {
  it("answers not_found for an id that cannot exist", async () => {
    await expect(removeFromWishlist(visitor, "not-an-id")).resolves.toBe("not_found");
    expect(models.WishlistItemModel.deleteOne).not.toHaveBeenCalled();
  });

  it("deletes the owner's row", async () => {
    models.WishlistItemModel.deleteOne.mockResolvedValue({ deletedCount: 1 });

    await expect(removeFromWishlist(visitor, productId.toString())).resolves.toBe("removed");
    const [filter] = models.WishlistItemModel.deleteOne.mock.calls[0];
    expect(filter).toMatchObject({ userId: null, sessionId: "s1" });
    expect(String(filter.productId)).toBe(productId.toString());
  });
});
