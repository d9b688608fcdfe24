import { randomInt, timingSafeEqual } from "node:crypto";
import { scrypt } from "@noble/hashes/scrypt.js";
import { bytesToHex, hexToBytes, randomBytes } from "@noble/hashes/utils.js";

const SCHEME = "scrypt";
const PARAMS = { N: 2 ** 14, r: 8, p: 1, dkLen: 32 };
const SALT_BYTES = 16;

const HEX_RE = /^(?:[0-9a-f]{2})+$/;

const PASSWORD_CHARACTERS =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!#$%&()*+,-./:;<=>?@[]^_{|}~";

function derive(password: string, salt: Uint8Array): Uint8Array {
  return scrypt(new TextEncoder().encode(password), salt, PARAMS);
}

/** Hashes a password as `scrypt$<saltHex>$<hashHex>`. */
export function hashPassword(password: string): string {
  const salt = randomBytes(SALT_BYTES);
  return `${SCHEME}$${bytesToHex(salt)}$${bytesToHex(derive(password, salt))}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, saltHex, hashHex, ...rest] = stored.split("$");
  if (
    scheme !== SCHEME ||
    rest.length > 0 ||
    !HEX_RE.test(saltHex ?? "") ||
    !HEX_RE.test(hashHex ?? "")
  ) {
    return false;
  }
  const expected = hexToBytes(hashHex);
  const actual = derive(password, hexToBytes(saltHex));
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/** A random password of 24 to 33 characters. */
export function generatePassword(): string {
  const length = randomInt(24, 34);
  let password = "";
  for (let i = 0; i < length; i++) {
    password += PASSWORD_CHARACTERS[randomInt(PASSWORD_CHARACTERS.length)];
  }
  return password;
}
