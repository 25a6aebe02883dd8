import { initStorefront } from "./storefront.js";

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", () => initStorefront(document));
} else {
  initStorefront(document);
}
