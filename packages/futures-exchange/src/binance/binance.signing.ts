import crypto from "node:crypto";

export type QueryValue = string | number | boolean | null | undefined;

export function buildQueryString(query: Record<string, QueryValue> | undefined): string {
  if (!query) return "";
  return Object.entries(query)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join("&");
}

export function signQuery(queryString: string, secretKey: string): string {
  return crypto.createHmac("sha256", secretKey).update(queryString).digest("hex");
}

/** Appends `signature` after the sorted parameters; it is not part of the signed payload. */
export function buildSignedQuery(query: Record<string, QueryValue>, secretKey: string): string {
  const queryString = buildQueryString(query);
  const signature = signQuery(queryString, secretKey);
  return queryString ? `${queryString}&signature=${signature}` : `signature=${signature}`;
}
