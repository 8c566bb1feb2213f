import { isPlainObject } from "@/lib/rating/guards";

/** Parses a JSON request body; anything but an object reads as empty. */
export async function readJsonBody(req: Request): Promise<Record<string, unknown>> {
  const body: unknown = await req.json().catch(() => null);
  return isPlainObject(body) ? body : {};
}
