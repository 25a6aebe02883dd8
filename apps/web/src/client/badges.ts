export type BadgeKind = "cart" | "wishlist";

export function findBadges(kind: BadgeKind, doc: Document = document) {
  return Array.from(doc.querySelectorAll<HTMLElement>(`[data-${kind}-count]`));
}

export function readBadge(el: HTMLElement) {
  const value = Number.parseInt(el.textContent ?? "", 10);
  return Number.isFinite(value) ? value : 0;
}

// A zero count hides the badge rather than showing "0".
export function setBadge(el: HTMLElement, count: number) {
  const value = Math.max(0, Math.trunc(count));
  el.textContent = String(value);
  el.classList.toggle("d-none", value === 0);
}

export function setBadges(kind: BadgeKind, count: number, doc: Document = document) {
  for (const badge of findBadges(kind, doc)) {
    setBadge(badge, count);
  }
}
