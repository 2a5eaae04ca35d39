import { validateEnv } from "@/config/validateEnv";

const rawEnv = validateEnv();

const maybeSplit = (value?: string) =>
  value
    ?.split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const allowAllCors = rawEnv.CORS_ORIGIN?.trim() === "*";
const corsOriginConfig: boolean | string[] = allowAllCors ? true : maybeSplit(rawEnv.CORS_ORIGIN) ?? false;

export const config = {
  nodeEnv: rawEnv.NODE_ENV,
  server: {
    host: rawEnv.HOST,
    port: rawEnv.PORT,
    corsOrigins: corsOriginConfig,
    bodyLimit: rawEnv.REQUEST_BODY_LIMIT,
    requestIdHeader: "x-request-id",
  },
  database: {
    url: rawEnv.DATABASE_URL,
  },
  redis: {
    url: rawEnv.REDIS_URL,
  },
  queue: {
    prefix: rawEnv.QUEUE_PREFIX,
    workerConcurrency: rawEnv.WORKER_CONCURRENCY,
  },
  delivery: {
    timeoutMs: rawEnv.DELIVERY_TIMEOUT_MS,
    allowRetryFromScheduled: rawEnv.ALLOW_RETRY_FROM_SCHEDULED,
  },
  scheduler: {
    intervalSeconds: rawEnv.RETRY_SCAN_INTERVAL_SECONDS,
    batchSize: rawEnv.RETRY_SCAN_BATCH_SIZE,
    claimTtlMs: rawEnv.DISPATCH_CLAIM_TTL_MS,
  },
  email: {
    host: rawEnv.SMTP_HOST,
    port: rawEnv.SMTP_PORT,
    secure: rawEnv.SMTP_SECURE,
    user: rawEnv.SMTP_USER,
    password: rawEnv.SMTP_PASSWORD,
    from: rawEnv.MAIL_FROM,
    subject: rawEnv.MAIL_SUBJECT,
  },
  sms: {
    accountSid: rawEnv.TWILIO_ACCOUNT_SID,
    authToken: rawEnv.TWILIO_AUTH_TOKEN,
    fromNumber: rawEnv.TWILIO_PHONE_NUMBER,
  },
} as const;

export type AppConfig = typeof config;
export type EmailConfig = AppConfig["email"];
export type SmsConfig = AppConfig["sms"];
