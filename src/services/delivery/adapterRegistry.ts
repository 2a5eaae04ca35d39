import type { AppConfig } from "@/config/config";
import type { AdapterRegistry, DeliveryAdapter, DeliveryResult } from "@/services/delivery/adapter.types";
import { createEmailAdapter } from "@/services/delivery/email.adapter";
import { InAppAdapter } from "@/services/delivery/inApp.adapter";
import { createSmsAdapter } from "@/services/delivery/sms.adapter";
import type { NotificationChannel } from "@/types/notification";
import { AdapterConfigurationError } from "@/utils/errors";
import { logger } from "@/utils/logger";

/** Stands in for a channel whose transport was left unconfigured; every attempt fails and is retried. */
export class DisabledChannelAdapter implements DeliveryAdapter {
  constructor(readonly channel: NotificationChannel) {}

  async deliver(): Promise<DeliveryResult> {
    return { ok: false, reason: `${this.channel} channel is not configured` };
  }
}

function buildEmailAdapter(emailConfig: AppConfig["email"]): DeliveryAdapter {
  const { host, from } = emailConfig;

  if (!host && !from) {
    logger.warn("SMTP is not configured, email notifications will fail until it is");
    return new DisabledChannelAdapter("email");
  }

  if (!host || !from) {
    throw new AdapterConfigurationError("SMTP_HOST and MAIL_FROM must be set together", {
      missing: host ? "MAIL_FROM" : "SMTP_HOST",
    });
  }

  if (emailConfig.user && !emailConfig.password) {
    throw new AdapterConfigurationError("SMTP_PASSWORD is required when SMTP_USER is set");
  }

  return createEmailAdapter({ ...emailConfig, host, from });
}

function buildSmsAdapter(smsConfig: AppConfig["sms"]): DeliveryAdapter {
  const { accountSid, authToken, fromNumber } = smsConfig;
  const provided = [accountSid, authToken, fromNumber].filter((value) => value !== undefined).length;

  if (provided === 0) {
    logger.warn("Twilio is not configured, SMS notifications will fail until it is");
    return new DisabledChannelAdapter("sms");
  }

  if (!accountSid || !authToken || !fromNumber) {
    throw new AdapterConfigurationError(
      "TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_PHONE_NUMBER must be set together",
    );
  }

  return createSmsAdapter({ accountSid, authToken, fromNumber });
}

export function createAdapterRegistry(appConfig: Pick<AppConfig, "email" | "sms">): AdapterRegistry {
  return {
    email: buildEmailAdapter(appConfig.email),
    sms: buildSmsAdapter(appConfig.sms),
    in_app: new InAppAdapter(),
  };
}

export function resolveAdapter(registry: AdapterRegistry, channel: NotificationChannel): DeliveryAdapter {
  return registry[channel];
}
