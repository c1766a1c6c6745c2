import { z } from "zod";
import { ComponentError } from "../lifecycle/errors.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v));

const boolFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .optional()
  .transform((v) => v === "1" || v === "true" || v === "yes");

/**
 * Process settings read from the environment.
 * Each remote system has its own block; credentials are optional here
 * because the secrets provider may supply them later.
 */
export const SettingsSchema = z.object({
  log_level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  timeout_ms: z.coerce.number().int().positive().default(30_000),
  ledger_db_path: z.string().default("ironboot-ledger.db"),

  appliance: z.object({
    host: z.string().default("192.168.2.245"),
    port: z.coerce.number().int().positive().default(444),
    api_key: optionalString,
    pool: z.string().default("test"),
    verify_tls: boolFlag,
  }),

  bmc: z.object({
    user: z.string().default("root"),
    password: optionalString,
    nic: z.string().default("NIC.Integrated.1-1-1"),
    verify_tls: boolFlag,
  }),

  objects: z
    .object({
      endpoint: optionalString,
      region: z.string().default("us-east-1"),
      access_key: optionalString,
      secret_key: optionalString,
      private_bucket: z.string().default("r630-switchbot-private"),
      public_bucket: z.string().default("r630-switchbot-public"),
      public_base_url: optionalString,
    })
    .refine((o) => o.private_bucket !== o.public_bucket, {
      message: "must differ from the private bucket",
      path: ["public_bucket"],
    }),

  secrets: z.object({
    addr: optionalString,
    token: optionalString,
    /** AppRole credentials, used when no token is given. */
    role_id: optionalString,
    secret_id: optionalString,
    namespace: optionalString,
    mount_point: z.string().default("secret"),
    path_prefix: z.string().default("ironboot"),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;

type Env = Record<string, string | undefined>;

/** Read settings from environment variables. Invalid values are a CONFIGURATION error. */
export function loadSettings(env: Env = process.env): Settings {
  const parsed = SettingsSchema.safeParse({
    log_level: env.LOG_LEVEL,
    timeout_ms: env.IRONBOOT_TIMEOUT_MS,
    ledger_db_path: env.IRONBOOT_LEDGER_DB,
    appliance: {
      host: env.TRUENAS_HOST,
      port: env.TRUENAS_PORT,
      api_key: env.TRUENAS_API_KEY,
      pool: env.TRUENAS_POOL,
      verify_tls: env.TRUENAS_VERIFY_TLS,
    },
    bmc: {
      user: env.IDRAC_USER,
      password: env.IDRAC_PASSWORD,
      nic: env.IDRAC_NIC,
      verify_tls: env.IDRAC_VERIFY_TLS,
    },
    objects: {
      endpoint: env.S3_ENDPOINT,
      region: env.S3_REGION,
      access_key: env.S3_ACCESS_KEY,
      secret_key: env.S3_SECRET_KEY,
      private_bucket: env.S3_PRIVATE_BUCKET,
      public_bucket: env.S3_PUBLIC_BUCKET,
      public_base_url: env.S3_PUBLIC_BASE_URL,
    },
    secrets: {
      addr: env.VAULT_ADDR,
      token: env.VAULT_TOKEN,
      role_id: env.VAULT_ROLE_ID,
      secret_id: env.VAULT_SECRET_ID,
      namespace: env.VAULT_NAMESPACE,
      mount_point: env.VAULT_MOUNT_POINT,
      path_prefix: env.VAULT_PATH_PREFIX,
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ComponentError("CONFIGURATION", `Invalid settings: ${issues}`);
  }
  return parsed.data;
}
