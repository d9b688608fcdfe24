import { z } from "zod";

/** Optional ISO 8601 expiry timestamp; null or absent means it never expires. */
export const ExpiresSchema = z.iso
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .nullable()
  .optional();
