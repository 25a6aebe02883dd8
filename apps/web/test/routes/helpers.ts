import type { Response } from "supertest";

export const CSRF_TOKEN = "test-csrf-token";

export function responseCookies(res: Response): string[] {
  const header: unknown = res.headers["set-cookie"];
  return Array.isArray(header) ? header.map(String) : [];
}

export function cookieValue(res: Response, name: string) {
  const cookie = responseCookies(res).find((entry) => entry.startsWith(`${name}=`));
  return cookie ? cookie.slice(name.length + 1).split(";")[0] : null;
}
