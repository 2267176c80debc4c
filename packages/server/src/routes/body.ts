import type { Context } from "hono";
import type { z } from "zod";

export type BodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/**
 * Read and validate a JSON request body. An empty body is treated as `{}`
 * so that schemas with only optional fields accept bodiless requests.
 */
export async function readJsonBody<S extends z.ZodType>(
  c: Context,
  schema: S,
): Promise<BodyResult<z.output<S>>> {
  const text = await c.req.text();

  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      return {
        ok: false,
        response: c.json(
          {
            error: {
              code: 400,
              errorCode: "INVALID_BODY",
              message: "Request body must be valid JSON",
            },
          },
          400,
        ),
      };
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      response: c.json(
        {
          error: {
            code: 400,
            errorCode: "VALIDATION_ERROR",
            message: "Invalid request body",
            details: {
              issues: result.error.issues.map((issue) => ({
                path: issue.path.join("."),
                message: issue.message,
              })),
            },
          },
        },
        400,
      ),
    };
  }
  return { ok: true, data: result.data };
}
