import { getCookie } from "./cookies.js";

export const CSRF_COOKIE = "csrftoken";
export const CSRF_HEADER = "X-CSRFToken";

export type JsonResponse = {
  ok: boolean;
  status: number;
  data: unknown;
};

async function readJson(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    return null;
  }
  const data: unknown = await response.json();
  return data;
}

export async function getJson(url: string): Promise<JsonResponse> {
  const response = await fetch(url, {
    method: "GET",
    credentials: "same-origin",
    headers: { Accept: "application/json" }
  });
  return { ok: response.ok, status: response.status, data: await readJson(response) };
}

export async function postJson(url: string, body: unknown): Promise<JsonResponse> {
  const response = await fetch(url, {
    method: "POST",
    credentials: "same-origin",
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      [CSRF_HEADER]: getCookie(CSRF_COOKIE) ?? ""
    },
    body: JSON.stringify(body)
  });
  return { ok: response.ok, status: response.status, data: await readJson(response) };
}
