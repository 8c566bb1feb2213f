export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

export function errorCode(e: unknown) {
  if (e && typeof e === "object" && "code" in e) return String(e.code);
  return "";
}
