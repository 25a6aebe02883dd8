import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app.js";
import { addToCart } from "../../src/services/cart.js";
import { getProductVariants, searchProducts } from "../../src/services/catalog.js";
import { getCounts } from "../../src/services/counts.js";
import { mergeSessionIntoUser } from "../../src/services/session.js";
import { addToWishlist, countWishlist, removeFromWishlist } from "../../src/services/wishlist.js";
import { HttpError } from "../../src/utils/httpError.js";
import { signShopperToken } from "../tokens.js";
import { CSRF_TOKEN, cookieValue } from "./helpers.js";

vi.mock("../../src/services/cart.js");
vi.mock("../../src/services/catalog.js");
vi.mock("../../src/services/counts.js");
vi.mock("../../src/services/layout.js");
vi.mock("../../src/services/session.js");
vi.mock("../../src/services/wishlist.js");

const app = createApp();

function postApi(url: string) {
  return request(app).post(url).set("Cookie", [`csrftoken=${CSRF_TOKEN}`]).set("X-CSRFToken", CSRF_TOKEN);
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("GET /health", () => {
  it("reports the web service", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.service).toBe("web");
  });
});

describe("shopper identity", () => {
  it("issues session and csrf cookies to a new visitor", async () => {
    vi.mocked(getCounts).mockResolvedValue({ cartCount: 0, wishlistCount: 0 });

    const res = await request(app).get("/api/counts");

    expect(res.status).toBe(200);
    expect(cookieValue(res, "sid")).toMatch(/^[0-9a-f-]{36}$/);
    expect(cookieValue(res, "csrftoken")).toMatch(/^[0-9a-f]{64}$/);
    expect(getCounts).toHaveBeenCalledWith(
      expect.objectContaining({ userId: null, sessionId: cookieValue(res, "sid") })
    );
  });

  it("keeps an existing session", async () => {
    vi.mocked(getCounts).mockResolvedValue({ cartCount: 0, wishlistCount: 0 });
    const sid = "8c1f2d7e-3a4b-4c5d-9e6f-7a8b9c0d1e2f";

    const res = await request(app).get("/api/counts").set("Cookie", [`sid=${sid}`]);

    expect(cookieValue(res, "sid")).toBeNull();
    expect(getCounts).toHaveBeenCalledWith(expect.objectContaining({ sessionId: sid }));
  });

  it("uses a valid bearer token and merges the leftover session", async () => {
    vi.mocked(getCounts).mockResolvedValue({ cartCount: 1, wishlistCount: 2 });
    vi.mocked(mergeSessionIntoUser).mockResolvedValue({ cartLines: 1, wishlistItems: 0 });
    const sid = "8c1f2d7e-3a4b-4c5d-9e6f-7a8b9c0d1e2f";
    const token = signShopperToken({ userId: "u1", email: "shopper@example.com", displayName: "Mona" });

    const res = await request(app)
      .get("/api/counts")
      .set("Authorization", `Bearer ${token}`)
      .set("Cookie", [`sid=${sid}`]);

    expect(res.body).toEqual({ cart_count: 1, wishlist_count: 2 });
    expect(mergeSessionIntoUser).toHaveBeenCalledWith("u1", sid);
    expect(cookieValue(res, "sid")).toBe("");
    expect(getCounts).toHaveBeenCalledWith({
      userId: "u1",
      sessionId: null,
      email: "shopper@example.com",
      displayName: "Mona"
    });
  });

  it("ignores a token signed with another secret", async () => {
    vi.mocked(getCounts).mockResolvedValue({ cartCount: 0, wishlistCount: 0 });

    await request(app).get("/api/counts").set("Authorization", "Bearer not-a-real-token");

    expect(getCounts).toHaveBeenCalledWith(expect.objectContaining({ userId: null }));
    expect(mergeSessionIntoUser).not.toHaveBeenCalled();
  });
});

describe("csrf", () => {
  it("rejects api posts without the header", async () => {
    const res = await request(app)
      .post("/api/cart/add")
      .set("Cookie", [`csrftoken=${CSRF_TOKEN}`])
      .send({ product_id: "p1" });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ success: false, message: "CSRF verification failed." });
    expect(addToCart).not.toHaveBeenCalled();
  });

  it("rejects a header that does not match the cookie", async () => {
    const res = await request(app)
      .post("/api/wishlist/add")
      .set("Cookie", [`csrftoken=${CSRF_TOKEN}`])
      .set("X-CSRFToken", "something-else")
      .send({ product_id: "p1" });

    expect(res.status).toBe(403);
  });
});

describe("POST /api/cart/add", () => {
  it("adds the product and returns the cart count", async () => {
    vi.mocked(addToCart).mockResolvedValue({ cartCount: 3 });

    const res = await postApi("/api/cart/add").send({ product_id: "p1", quantity: 2 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, message: "Added to cart.", cart_count: 3 });
    expect(addToCart).toHaveBeenCalledWith(expect.objectContaining({ userId: null }), {
      productId: "p1",
      quantity: 2,
      variantId: undefined
    });
  });

  it("validates the quantity", async () => {
    const res = await postApi("/api/cart/add").send({ product_id: "p1", quantity: 0 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: "Quantity must be at least 1." });
    expect(addToCart).not.toHaveBeenCalled();
  });

  it("reports a missing product id", async () => {
    const res = await postApi("/api/cart/add").send({ quantity: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: "Product not provided." });
  });

  it("rejects a quantity that is not a number", async () => {
    const res = await postApi("/api/cart/add").send({ product_id: "p1", quantity: "abc" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: "Invalid quantity." });
    expect(addToCart).not.toHaveBeenCalled();
  });

  it("maps service errors to their status", async () => {
    vi.mocked(addToCart).mockRejectedValue(new HttpError(409, "CONFLICT", "Not enough stock available."));

    const res = await postApi("/api/cart/add").send({ product_id: "p1" });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ success: false, message: "Not enough stock available." });
  });

  it("hides unexpected errors", async () => {
    vi.mocked(addToCart).mockRejectedValue(new Error("connection reset"));

    const res = await postApi("/api/cart/add").send({ product_id: "p1" });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, message: "Something went wrong. Please try again." });
  });
});

describe("wishlist api", () => {
  it("adds a product", async () => {
    vi.mocked(addToWishlist).mockResolvedValue("added");
    vi.mocked(countWishlist).mockResolvedValue(4);

    const res = await postApi("/api/wishlist/add").send({ product_id: "p1" });

    expect(res.body).toEqual({ success: true, status: "added", message: "Added to wishlist.", wishlist_count: 4 });
    expect(addToWishlist).toHaveBeenCalledWith(expect.objectContaining({ userId: null }), "p1");
  });

  it("reports a product that was already saved", async () => {
    vi.mocked(addToWishlist).mockResolvedValue("exists");
    vi.mocked(countWishlist).mockResolvedValue(4);

    const res = await postApi("/api/wishlist/add").send({ product_id: 42 });

    expect(res.body.status).toBe("exists");
    expect(res.body.message).toBe("Already in your wishlist.");
    expect(addToWishlist).toHaveBeenCalledWith(expect.anything(), "42");
  });

  it("rejects a blank product id", async () => {
    const res = await postApi("/api/wishlist/add").send({ product_id: "   " });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, status: "error", message: "Product not provided." });
  });

  it("reports a body without a product id", async () => {
    const res = await postApi("/api/wishlist/add").send({});

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, status: "error", message: "Product not provided." });
    expect(addToWishlist).not.toHaveBeenCalled();
  });

  it("removes a product", async () => {
    vi.mocked(removeFromWishlist).mockResolvedValue("removed");
    vi.mocked(countWishlist).mockResolvedValue(0);

    const res = await postApi("/api/wishlist/remove").send({ product_id: "p1" });

    expect(res.body).toEqual({ success: true, status: "removed", message: "Removed from wishlist.", wishlist_count: 0 });
  });

  it("treats removing a missing product as done", async () => {
    vi.mocked(removeFromWishlist).mockResolvedValue("not_found");
    vi.mocked(countWishlist).mockResolvedValue(0);

    const res = await postApi("/api/wishlist/remove").send({ product_id: "p1" });

    expect(res.body.success).toBe(true);
    expect(res.body.status).toBe("not_found");
  });
});

describe("catalog api", () => {
  it("searches products", async () => {
    const row = {
      id: "p1",
      name: "Oxford Shirt",
      price: "899.00",
      url: "/product/oxford-shirt",
      image: "",
      category: "Men",
      brand: "Northwind"
    };
    vi.mocked(searchProducts).mockResolvedValue([row]);

    const res = await request(app).get("/api/search").query({ q: "shirt" });

    expect(res.body).toEqual({ results: [row] });
    expect(searchProducts).toHaveBeenCalledWith("shirt");
  });

  it("passes an empty query when q is missing", async () => {
    vi.mocked(searchProducts).mockResolvedValue([]);

    await request(app).get("/api/search");

    expect(searchProducts).toHaveBeenCalledWith("");
  });

  it("lists variants filtered by colour", async () => {
    vi.mocked(getProductVariants).mockResolvedValue([]);

    const res = await request(app).get("/api/products/p1/variants").query({ color: "Navy" });

    expect(res.body).toEqual({ variants: [] });
    expect(getProductVariants).toHaveBeenCalledWith("p1", "Navy", undefined);
  });

  it("returns json for unknown api routes", async () => {
    const res = await request(app).get("/api/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: "Route not found." });
  });
});
