import type { ZodType, ZodTypeDef } from "zod";
import { fail } from "./http.ts";

export async function parseJsonBody<T>(req: Request, schema: ZodType<T, ZodTypeDef, unknown>) {
  const body: unknown = await req.json().catch(() => null);
  const parsed = schema.safeParse(body);

  if (!parsed.success) {
    return {
      success: false as const,
      response: fail("VALIDATION_ERROR", "Invalid request body.", 422, parsed.error.flatten())
    };
  }

  return {
    success: true as const,
    data: parsed.data
  };
}
