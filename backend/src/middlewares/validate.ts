import type { z, ZodTypeAny } from "zod";
import { HttpError } from "../utils/httpError";

function issuesMessage(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join(", ");
}

/** Parse a request body or throw HttpError 400. */
export function parseBody<T extends ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) throw new HttpError(400, issuesMessage(result.error));
  return result.data;
}
