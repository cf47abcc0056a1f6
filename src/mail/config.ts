import { z } from "zod";
import type { MailConfig } from "./types.js";

const IMAP_SECURE_PORT = 993;
const SMTP_SUBMISSION_PORT = 587;
const SMTPS_PORT = 465;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_PREVIEW_LENGTH = 300;

function required(name: string) {
  return z
    .string({ required_error: `${name} environment variable is required` })
    .trim()
    .min(1, `${name} environment variable is required`);
}

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value === "" ? defaultValue : value !== "false"
    );
}

function positiveInt(name: string, defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? String(defaultValue) : value))
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .positive(`${name} must be positive`)
    );
}

const envSchema = z.object({
  EMAIL_USER: required("EMAIL_USER"),
  EMAIL_PASS: required("EMAIL_PASS"),
  IMAP_HOST: required("IMAP_HOST"),
  IMAP_PORT: positiveInt("IMAP_PORT", IMAP_SECURE_PORT),
  IMAP_SECURE: flag(true),
  IMAP_TLS_REJECT_UNAUTHORIZED: flag(true),
  SMTP_HOST: required("SMTP_HOST"),
  SMTP_PORT: positiveInt("SMTP_PORT", SMTP_SUBMISSION_PORT),
  SMTP_SECURE: z.string().optional(),
  MAIL_TIMEOUT_MS: positiveInt("MAIL_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
  MAIL_PREVIEW_LENGTH: positiveInt("MAIL_PREVIEW_LENGTH", DEFAULT_PREVIEW_LENGTH),
});

/**
 * Build the account configuration from environment variables.
 * Throws on the first missing or malformed value; callers treat that as a
 * fatal startup error.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): MailConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(result.error.issues[0]?.message ?? "Invalid mail configuration");
  }
  const vars = result.data;

  // Port 465 speaks TLS from the first byte; everything else upgrades with STARTTLS.
  const smtpSecure =
    vars.SMTP_SECURE === undefined || vars.SMTP_SECURE === ""
      ? vars.SMTP_PORT === SMTPS_PORT
      : vars.SMTP_SECURE !== "false";

  return {
    user: vars.EMAIL_USER,
    pass: vars.EMAIL_PASS,
    imap: {
      host: vars.IMAP_HOST,
      port: vars.IMAP_PORT,
      secure: vars.IMAP_SECURE,
      tlsRejectUnauthorized: vars.IMAP_TLS_REJECT_UNAUTHORIZED,
    },
    smtp: {
      host: vars.SMTP_HOST,
      port: vars.SMTP_PORT,
      secure: smtpSecure,
    },
    timeoutMs: vars.MAIL_TIMEOUT_MS,
    previewLength: vars.MAIL_PREVIEW_LENGTH,
  };
}
