import { addToCart } from "./cart.js";
import { initCarousels } from "./carousel.js";
import { createClickGuard } from "./clickGuard.js";
import { refreshCounts } from "./counts.js";
import { toggleWishlist } from "./wishlist.js";

/** Wires the page's buttons with one delegated click listener, then syncs badges and starts carousels. */
export function initStorefront(doc: Document = document) {
  const guard = createClickGuard();

  doc.addEventListener("click", (event) => {
    const target = event.target;
    if (!(target instanceof Element)) {
      return;
    }

    const wishlistButton = target.closest<HTMLButtonElement>("button[data-wishlist-toggle]");
    if (wishlistButton) {
      event.preventDefault();
      if (!wishlistButton.disabled && guard.accept(`wishlist:${wishlistButton.dataset.productId ?? ""}`)) {
        void toggleWishlist(wishlistButton, doc);
      }
      return;
    }

    const cartButton = target.closest<HTMLButtonElement>("button[data-add-to-cart]");
    if (cartButton) {
      event.preventDefault();
      if (!cartButton.disabled && guard.accept(`cart:${cartButton.dataset.productId ?? ""}`)) {
        void addToCart(cartButton, doc);
      }
    }
  });

  void refreshCounts(doc);
  initCarousels(doc);
}
