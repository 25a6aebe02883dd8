export const CLICK_GUARD_MS = 500;

export type ClickGuard = {
  accept(key: string, now?: number): boolean;
};

/** Drops a repeat click on the same control that lands within `windowMs` of the last accepted one. */
export function createClickGuard(windowMs = CLICK_GUARD_MS): ClickGuard {
  const lastAccepted = new Map<string, number>();

  return {
    accept(key, now = Date.now()) {
      const last = lastAccepted.get(key);
      if (last !== undefined && now - last < windowMs) {
        return false;
      }
      lastAccepted.set(key, now);
      return true;
    }
  };
}
