import { setBadges } from "./badges.js";
import { ENDPOINTS, readCounts } from "./endpoints.js";
import { getJson } from "./http.js";

export async function refreshCounts(doc: Document = document) {
  try {
    const response = await getJson(ENDPOINTS.counts);
    const counts = readCounts(response.data);
    if (!response.ok || !counts) {
      console.error("counts request failed", response.status);
      return;
    }
    setBadges("cart", counts.cart_count, doc);
    setBadges("wishlist", counts.wishlist_count, doc);
  } catch (error) {
    console.error("counts request failed", error);
  }
}
