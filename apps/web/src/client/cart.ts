import { setBadges } from "./badges.js";
import { ENDPOINTS, readCartPayload, type CartPayload } from "./endpoints.js";
import { postJson } from "./http.js";
import { showToast } from "./toast.js";

const FALLBACK_ERROR = "Could not add this item to your cart. Please try again.";

type AddToCartBody = {
  product_id: string;
  quantity: number;
  variant_id?: string;
};

// On the product page the variant picker and quantity input sit beside the button.
export function addToCartBody(button: HTMLButtonElement, productId: string): AddToCartBody {
  const form = button.closest("[data-product-form]");
  const variantSelect = form?.querySelector<HTMLSelectElement>("select[data-variant-select]");
  const quantityInput = form?.querySelector<HTMLInputElement>("input[data-quantity-input]");
  const quantity = Number.parseInt(quantityInput?.value ?? button.dataset.quantity ?? "1", 10);

  const body: AddToCartBody = { product_id: productId, quantity: Number.isFinite(quantity) ? quantity : 1 };
  if (variantSelect?.value) {
    body.variant_id = variantSelect.value;
  }
  return body;
}

export async function addToCart(button: HTMLButtonElement, doc: Document = document) {
  const productId = button.dataset.productId;
  if (!productId) {
    return;
  }

  button.disabled = true;

  let payload: CartPayload | null = null;
  try {
    const response = await postJson(ENDPOINTS.cartAdd, addToCartBody(button, productId));
    payload = readCartPayload(response.data);
  } catch (error) {
    console.error("add to cart request failed", error);
  }

  if (payload?.success) {
    if (payload.cart_count !== undefined) {
      setBadges("cart", payload.cart_count, doc);
    }
    showToast(payload.message, "success", doc);
  } else {
    showToast(payload?.message ?? FALLBACK_ERROR, "error", doc);
  }

  button.disabled = false;
}
