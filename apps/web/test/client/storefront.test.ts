// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ENDPOINTS } from "../../src/client/endpoints.js";
import { initStorefront } from "../../src/client/storefront.js";
import { jsonResponse } from "./fetchStub.js";

function routeFetch() {
  const fetchMock = vi.fn(async (input: RequestInfo | URL, _init?: RequestInit) => {
    switch (String(input)) {
      case ENDPOINTS.counts:
        return jsonResponse({ cart_count: 0, wishlist_count: 0 });
      case ENDPOINTS.cartAdd:
        return jsonResponse({ success: true, message: "Added to cart.", cart_count: 1 });
      case ENDPOINTS.wishlistAdd:
        return jsonResponse({ success: true, status: "added", message: "Added to wishlist.", wishlist_count: 1 });
      case ENDPOINTS.wishlistRemove:
        return jsonResponse({ success: true, status: "removed", message: "Removed from wishlist.", wishlist_count: 0 });
      default:
        throw new Error(`unexpected fetch ${String(input)}`);
    }
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

let now = 0;
let doc: Document;
let fetchMock: ReturnType<typeof routeFetch>;

function element<T extends Element>(selector: string) {
  const el = doc.querySelector<T>(selector);
  if (!el) {
    throw new Error(`missing ${selector}`);
  }
  return el;
}

function callsTo(url: string) {
  return fetchMock.mock.calls.filter(([input]) => String(input) === url).length;
}

async function settled(button: HTMLButtonElement) {
  await vi.waitFor(() => expect(button.disabled).toBe(false));
}

beforeEach(() => {
  now = 10_000;
  vi.spyOn(Date, "now").mockImplementation(() => now);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  document.cookie = "csrftoken=test-csrf";
  fetchMock = routeFetch();

  doc = document.implementation.createHTMLDocument("storefront");
  doc.body.innerHTML = `
    <span class="badge" data-wishlist-count="">3</span>
    <span class="badge" data-cart-count="">5</span>
    <button type="button" id="heart" data-wishlist-toggle="" data-product-id="p1" aria-pressed="false"><i class="bi bi-heart"></i></button>
    <button type="button" id="add-p1" data-add-to-cart="" data-product-id="p1" data-quantity="1">Add</button>
    <button type="button" id="add-p2" data-add-to-cart="" data-product-id="p2" data-quantity="1">Add</button>
    <div id="toast-container"></div>
  `;
  initStorefront(doc);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("initStorefront", () => {
  it("syncs the badges from the counts endpoint on start", async () => {
    await vi.waitFor(() => expect(element("[data-cart-count]").textContent).toBe("0"));
    expect(element("[data-wishlist-count]").textContent).toBe("0");
    expect(callsTo(ENDPOINTS.counts)).toBe(1);
  });

  it("sends one add-to-cart request for clicks inside the guard window", async () => {
    const add = element<HTMLButtonElement>("#add-p1");

    add.click();
    await settled(add);
    now += 300;
    add.click();

    expect(callsTo(ENDPOINTS.cartAdd)).toBe(1);
    expect(add.disabled).toBe(false);

    now += 300;
    add.click();
    await settled(add);

    expect(callsTo(ENDPOINTS.cartAdd)).toBe(2);
  });

  it("guards each product separately", async () => {
    element<HTMLButtonElement>("#add-p1").click();
    element<HTMLButtonElement>("#add-p2").click();

    expect(callsTo(ENDPOINTS.cartAdd)).toBe(2);
    await settled(element<HTMLButtonElement>("#add-p1"));
    await settled(element<HTMLButtonElement>("#add-p2"));
  });

  it("toggles the wishlist from a click on the heart icon once per window", async () => {
    const heart = element<HTMLButtonElement>("#heart");
    const icon = element<HTMLElement>("#heart i");

    icon.click();
    await settled(heart);
    expect(heart.getAttribute("aria-pressed")).toBe("true");

    now += 200;
    icon.click();
    expect(callsTo(ENDPOINTS.wishlistAdd) + callsTo(ENDPOINTS.wishlistRemove)).toBe(1);
    expect(heart.getAttribute("aria-pressed")).toBe("true");

    now += 500;
    icon.click();
    await settled(heart);

    expect(callsTo(ENDPOINTS.wishlistAdd)).toBe(1);
    expect(callsTo(ENDPOINTS.wishlistRemove)).toBe(1);
    expect(heart.getAttribute("aria-pressed")).toBe("false");
  });
});
