import "dotenv/config";
import { signSessionToken } from "../src/api/auth";
import { loadConfig } from "../src/config";

const [userId, ttl = "3600"] = process.argv.slice(2);

if (!userId) {
  console.error("Usage: npm run token -- <userId> [ttlSeconds]");
  process.exit(1);
}

const ttlSeconds = Number(ttl);
if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
  console.error(`❌ ttlSeconds must be a positive integer, got "${ttl}"`);
  process.exit(1);
}

const { authSecret } = loadConfig();
const token = signSessionToken(
  { sub: userId, exp: Math.floor(Date.now() / 1000) + ttlSeconds },
  authSecret,
);

console.log(token);
