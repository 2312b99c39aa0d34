import { z } from "zod";

export const APP_CONFIG = "APP_CONFIG";

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional()
);

const envSchema = z.object({
  MONGO_URI: z.string().default("mongodb://127.0.0.1:27017/formblocks"),
  PORT: z.coerce.number().int().positive().default(3000),
  RECAPTCHA_PUBLIC_KEY: optionalString,
  RECAPTCHA_PRIVATE_KEY: optionalString
});

export interface RecaptchaKeys {
  publicKey: string;
  privateKey: string;
}

export interface AppConfig {
  mongoUri: string;
  port: number;
  recaptcha: RecaptchaKeys | null;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const { MONGO_URI, PORT, RECAPTCHA_PUBLIC_KEY, RECAPTCHA_PRIVATE_KEY } = parsed.data;
  return {
    mongoUri: MONGO_URI,
    port: PORT,
    // Captcha blocks are only offered when both keys are present.
    recaptcha:
      RECAPTCHA_PUBLIC_KEY && RECAPTCHA_PRIVATE_KEY
        ? { publicKey: RECAPTCHA_PUBLIC_KEY, privateKey: RECAPTCHA_PRIVATE_KEY }
        : null
  };
}
