import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app.js";
import { getCart, removeCartLine, updateCartLine } from "../../src/services/cart.js";
import { getCategoryListing, getHomeSections, searchProductCards } from "../../src/services/catalog.js";
import { loadPageContext } from "../../src/services/layout.js";
import { listOrders } from "../../src/services/orders.js";
import { listActiveSliders } from "../../src/services/sliders.js";
import { notFound } from "../../src/utils/httpError.js";
import { paginate } from "../../src/utils/pagination.js";
import type { CategoryListing } from "../../src/views/viewModels.js";
import { emptyTotals, makeCard, makeLayout, makeSettings } from "../fixtures.js";
import { signShopperToken } from "../tokens.js";
import { CSRF_TOKEN } from "./helpers.js";

vi.mock("../../src/services/cart.js");
vi.mock("../../src/services/catalog.js");
vi.mock("../../src/services/layout.js");
vi.mock("../../src/services/orders.js");
vi.mock("../../src/services/session.js");
vi.mock("../../src/services/sliders.js");

const app = createApp();

const menListing: CategoryListing = {
  category: { id: "c1", name: "Men", slug: "men", url: "/category/men", imageUrl: null, description: "" },
  subcategory: null,
  url: "/category/men",
  products: [],
  pagination: paginate(0, 1, 12),
  subcategories: [],
  brands: [],
  fitTypes: [],
  colors: [],
  sizes: [],
  priceRange: { min: 0, max: 0 },
  filters: { sort: "price_low", page: 2 }
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(loadPageContext).mockResolvedValue({ layout: makeLayout(), settings: makeSettings() });
});

describe("GET /", () => {
  it("renders the home page with its sections", async () => {
    vi.mocked(listActiveSliders).mockResolvedValue([]);
    vi.mocked(getHomeSections).mockResolvedValue({
      featured: [makeCard()],
      newArrivals: [],
      bestSellers: [],
      sale: []
    });

    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/text\/html/);
    expect(res.text.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(res.text).toContain('id="featured"');
    expect(getHomeSections).toHaveBeenCalledWith(8);
  });
});

describe("catalog pages", () => {
  it("parses listing filters from the query", async () => {
    vi.mocked(getCategoryListing).mockResolvedValue(menListing);

    const res = await request(app).get("/category/men").query({ sort: "price_low", page: "2", brand: "northwind" });

    expect(res.status).toBe(200);
    expect(getCategoryListing).toHaveBeenCalledWith(
      "men",
      expect.objectContaining({ sort: "price_low", page: 2, brand: "northwind" }),
      12
    );
  });

  it("passes the subcategory slug for nested category pages", async () => {
    const shirts = { id: "s1", name: "Shirts", slug: "shirts", url: "/category/men/shirts", imageUrl: null, description: "" };
    vi.mocked(getCategoryListing).mockResolvedValue({ ...menListing, subcategory: shirts, url: shirts.url });

    const res = await request(app).get("/category/men/shirts").query({ fit_type: "slim-fit" });

    expect(res.status).toBe(200);
    expect(getCategoryListing).toHaveBeenCalledWith(
      "men",
      expect.objectContaining({ fitType: "slim-fit", page: 1 }),
      12,
      "shirts"
    );
    expect(res.text).toContain('action="/category/men/shirts"');
  });

  it("renders a 404 page for an unknown subcategory", async () => {
    vi.mocked(getCategoryListing).mockRejectedValue(notFound("Subcategory not found."));

    const res = await request(app).get("/category/men/missing");

    expect(res.status).toBe(404);
    expect(res.text).toContain("Subcategory not found.");
  });

  it("renders a 404 page for an unknown category", async () => {
    vi.mocked(getCategoryListing).mockRejectedValue(notFound("Category not found."));

    const res = await request(app).get("/category/missing");

    expect(res.status).toBe(404);
    expect(res.text).toContain("Category not found.");
  });

  it("searches product cards for the search page", async () => {
    vi.mocked(searchProductCards).mockResolvedValue([makeCard()]);

    const res = await request(app).get("/search").query({ q: "oxford" });

    expect(res.status).toBe(200);
    expect(searchProductCards).toHaveBeenCalledWith("oxford");
    expect(res.text).toContain("Oxford Shirt");
  });
});

describe("GET /orders", () => {
  it("asks anonymous shoppers to sign in", async () => {
    const res = await request(app).get("/orders");

    expect(res.status).toBe(401);
    expect(res.text).toContain("Please sign in to view your orders.");
    expect(listOrders).not.toHaveBeenCalled();
  });

  it("lists the signed-in user's orders", async () => {
    vi.mocked(listOrders).mockResolvedValue({ orders: [], pagination: paginate(0, 2, 12) });
    const token = signShopperToken({ userId: "u1", email: "shopper@example.com", displayName: "Mona" });

    const res = await request(app).get("/orders?page=2").set("Cookie", [`access_token=${token}`]);

    expect(res.status).toBe(200);
    expect(listOrders).toHaveBeenCalledWith("u1", 2, 12);
  });
});

describe("cart pages", () => {
  it("passes the shipping zone to the cart", async () => {
    vi.mocked(getCart).mockResolvedValue({ lines: [], totals: emptyTotals, zone: "remote" });

    const res = await request(app).get("/cart").query({ zone: "remote" });

    expect(res.status).toBe(200);
    expect(getCart).toHaveBeenCalledWith(expect.objectContaining({ userId: null }), makeSettings(), "remote");
  });

  it("updates a line and redirects back to the cart", async () => {
    vi.mocked(updateCartLine).mockResolvedValue(undefined);

    const res = await request(app)
      .post("/cart/lines/line-1")
      .set("Cookie", [`csrftoken=${CSRF_TOKEN}`])
      .type("form")
      .send({ quantity: "3", _csrf: CSRF_TOKEN });

    expect(res.status).toBe(303);
    expect(res.headers.location).toBe("/cart");
    expect(updateCartLine).toHaveBeenCalledWith(expect.objectContaining({ userId: null }), "line-1", 3);
  });

  it("rejects an out of range quantity", async () => {
    const res = await request(app)
      .post("/cart/lines/line-1")
      .set("Cookie", [`csrftoken=${CSRF_TOKEN}`])
      .type("form")
      .send({ quantity: "99", _csrf: CSRF_TOKEN });

    expect(res.status).toBe(400);
    expect(res.text).toContain("Quantity must be between 0 and 20.");
    expect(updateCartLine).not.toHaveBeenCalled();
  });

  it("refuses a form post without the csrf field", async () => {
    const res = await request(app)
      .post("/cart/lines/line-1/remove")
      .set("Cookie", [`csrftoken=${CSRF_TOKEN}`])
      .type("form")
      .send({});

    expect(res.status).toBe(403);
    expect(res.text).toContain("CSRF verification failed.");
    expect(removeCartLine).not.toHaveBeenCalled();
  });
});

describe("unknown pages", () => {
  it("renders the not found page", async () => {
    const res = await request(app).get("/no-such-page");

    expect(res.status).toBe(404);
    expect(res.text).toContain("Page Not Found");
    expect(res.text).toContain("Page not found.");
  });
});
