import jwt from "jsonwebtoken";
import { shopperClaimsSchema, type ShopperClaims } from "@shopfront/shared-types";
import { env } from "../config/env.js";

// Tokens are issued by the account service; the storefront only verifies them.
export function verifyShopperToken(token: string): ShopperClaims | null {
  try {
    const parsed = shopperClaimsSchema.safeParse(jwt.verify(token, env.JWT_SECRET));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
