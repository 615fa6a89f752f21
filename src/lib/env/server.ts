import { z } from "zod";

const ServerEnvSchema = z.object({
  // Phone numbers written without a "+" are parsed in this region and must
  // carry this calling code to count as local.
  PHONE_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default("1"),
  PHONE_REGION_CODE: z
    .string()
    .regex(/^[A-Z]{2}$/)
    .default("US"),

  // Host serving email assets (action-link arrow, preview logos)
  NOTIFY_ASSET_DOMAIN: z.string().min(1).default("assets.example.com"),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

let cached: ServerEnv | null = null;

export function serverEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  if (source === process.env && cached) return cached;

  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }

  if (source === process.env) cached = parsed.data;
  return parsed.data;
}

/** Drop the memoized env so the next read sees process.env again. */
export function resetEnvCache(): void {
  cached = null;
}
