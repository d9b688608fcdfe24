import { randomBytes } from "node:crypto";

/** A random 16-byte value as 32 hex characters. */
export function generateToken(): string {
  return randomBytes(16).toString("hex");
}
