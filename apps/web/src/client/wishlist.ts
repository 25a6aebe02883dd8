import { findBadges, readBadge, setBadge } from "./badges.js";
import { ENDPOINTS, readWishlistPayload, type WishlistPayload } from "./endpoints.js";
import { postJson } from "./http.js";
import { showToast } from "./toast.js";

const FALLBACK_ERROR = "Could not update your wishlist. Please try again.";

function toggleButtonsFor(productId: string, doc: Document) {
  return Array.from(doc.querySelectorAll<HTMLButtonElement>("button[data-wishlist-toggle]")).filter(
    (button) => button.dataset.productId === productId
  );
}

export function isWishlisted(button: HTMLButtonElement) {
  return button.getAttribute("aria-pressed") === "true";
}

export function applyWishlistState(button: HTMLButtonElement, wishlisted: boolean) {
  button.setAttribute("aria-pressed", String(wishlisted));
  button.setAttribute("aria-label", wishlisted ? "Remove from wishlist" : "Add to wishlist");
  const icon = button.querySelector("i");
  if (icon) {
    icon.classList.toggle("bi-heart-fill", wishlisted);
    icon.classList.toggle("bi-heart", !wishlisted);
  }
}

/**
 * Flips the heart and badge straight away, then confirms with the server.
 * A failed request puts both back the way they were.
 */
export async function toggleWishlist(button: HTMLButtonElement, doc: Document = document) {
  const productId = button.dataset.productId;
  if (!productId) {
    return;
  }

  const wasWishlisted = isWishlisted(button);
  const buttons = toggleButtonsFor(productId, doc);
  const badges = findBadges("wishlist", doc);
  const previousCounts = badges.map(readBadge);

  button.disabled = true;
  buttons.forEach((candidate) => applyWishlistState(candidate, !wasWishlisted));
  badges.forEach((badge, index) => setBadge(badge, previousCounts[index] + (wasWishlisted ? -1 : 1)));

  let payload: WishlistPayload | null = null;
  try {
    const response = await postJson(wasWishlisted ? ENDPOINTS.wishlistRemove : ENDPOINTS.wishlistAdd, {
      product_id: productId
    });
    payload = readWishlistPayload(response.data);
  } catch (error) {
    console.error("wishlist request failed", error);
  }

  if (payload?.success) {
    const serverCount = payload.wishlist_count;
    if (serverCount !== undefined) {
      badges.forEach((badge) => setBadge(badge, serverCount));
    }
    showToast(payload.message, "success", doc);
  } else {
    buttons.forEach((candidate) => applyWishlistState(candidate, wasWishlisted));
    badges.forEach((badge, index) => setBadge(badge, previousCounts[index]));
    showToast(payload?.message ?? FALLBACK_ERROR, "error", doc);
  }

  button.disabled = false;
}
