import twilio from "twilio";

import type { DeliveryAdapter, DeliveryResult } from "@/services/delivery/adapter.types";
import { isValidPhoneNumber } from "@/services/delivery/destinationValidators";
import { describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface SmsMessage {
  body: string;
  from: string;
  to: string;
}

export interface SmsTransport {
  messages: {
    create(message: SmsMessage): Promise<{ sid: string }>;
  };
}

export interface TwilioCredentials {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export class SmsAdapter implements DeliveryAdapter {
  readonly channel = "sms" as const;

  constructor(
    private readonly transport: SmsTransport,
    private readonly fromNumber: string,
  ) {}

  async deliver(destination: string | null, message: string): Promise<DeliveryResult> {
    if (!isValidPhoneNumber(destination)) {
      return { ok: false, reason: `Invalid phone destination: ${destination ?? "<missing>"}` };
    }

    try {
      const created = await this.transport.messages.create({
        body: message,
        from: this.fromNumber,
        to: destination,
      });

      return { ok: true, providerMessageId: created.sid };
    } catch (error) {
      logger.warn("Twilio delivery failed", { destination, error: describeError(error) });
      return { ok: false, reason: `Twilio delivery failed: ${describeError(error)}` };
    }
  }
}

export function createSmsAdapter(credentials: TwilioCredentials): SmsAdapter {
  const client = twilio(credentials.accountSid, credentials.authToken);
  return new SmsAdapter(client, credentials.fromNumber);
}
