import { createMiddleware } from "hono/factory";
import jwt from "jsonwebtoken";
import { z } from "zod";

export interface AdminUser {
  name: string;
  role: string;
}

declare module "hono" {
  interface ContextVariableMap {
    adminUser: AdminUser;
  }
}

const TOKEN_TTL = "24h";

const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.string(),
});

export function signAdminToken(
  secret: string,
  name: string,
  role = "admin",
): string {
  return jwt.sign({ role }, secret, { subject: name, expiresIn: TOKEN_TTL });
}

/**
 * Admin API guard: `Authorization: Bearer <jwt>` signed with the API secret
 */
export function createRequireAdmin(secret: string) {
  return createMiddleware(async (c, next) => {
    const header = c.req.header("Authorization") ?? "";
    const token = /^Bearer\s+(.+)$/.exec(header)?.[1];

    if (!token) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    let payload: unknown;
    try {
      payload = jwt.verify(token, secret);
    } catch {
      return c.json({ error: "Invalid token" }, 401);
    }

    const parsed = tokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return c.json({ error: "Invalid token" }, 401);
    }
    if (parsed.data.role !== "admin") {
      return c.json({ error: "Forbidden" }, 403);
    }

    c.set("adminUser", { name: parsed.data.sub, role: parsed.data.role });
    await next();
  });
}
