/** Who is shopping: a signed-in user, or an anonymous browser session. */
export type Shopper = {
  userId: string | null;
  sessionId: string | null;
  email: string | null;
  displayName: string | null;
};

export type OwnerFilter = { userId: string } | { userId: null; sessionId: string };

export function ownerFilter(shopper: Shopper): OwnerFilter | null {
  if (shopper.userId) {
    return { userId: shopper.userId };
  }
  if (shopper.sessionId) {
    return { userId: null, sessionId: shopper.sessionId };
  }
  return null;
}
