/**
 * Prints a 24h admin API token signed with ADMIN_JWT_SECRET.
 * Run with: tsx --env-file=.env scripts/issue-admin-token.ts <name>
 */

import { signAdminToken } from "../src/admin/server/middleware.js";

const secret = process.env.ADMIN_JWT_SECRET;
if (!secret) {
  console.error("ADMIN_JWT_SECRET is not set.");
  process.exit(1);
}

const name = process.argv[2];
if (!name) {
  console.error("Usage: tsx --env-file=.env scripts/issue-admin-token.ts <name>");
  process.exit(1);
}

console.log(signAdminToken(secret, name));
