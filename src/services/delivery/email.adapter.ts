import nodemailer from "nodemailer";

import type { EmailConfig } from "@/config/config";
import type { DeliveryAdapter, DeliveryResult } from "@/services/delivery/adapter.types";
import { isValidEmail } from "@/services/delivery/destinationValidators";
import { describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(mail: MailMessage): Promise<{ messageId: string }>;
}

export interface EmailAdapterOptions {
  from: string;
  subject: string;
}

export class EmailAdapter implements DeliveryAdapter {
  readonly channel = "email" as const;

  constructor(
    private readonly transport: MailTransport,
    private readonly options: EmailAdapterOptions,
  ) {}

  async deliver(destination: string | null, message: string): Promise<DeliveryResult> {
    if (!isValidEmail(destination)) {
      return { ok: false, reason: `Invalid email destination: ${destination ?? "<missing>"}` };
    }

    try {
      const info = await this.transport.sendMail({
        from: this.options.from,
        to: destination,
        subject: this.options.subject,
        text: message,
      });

      return { ok: true, providerMessageId: info.messageId };
    } catch (error) {
      logger.warn("SMTP delivery failed", { destination, error: describeError(error) });
      return { ok: false, reason: `SMTP delivery failed: ${describeError(error)}` };
    }
  }
}

export function createEmailAdapter(emailConfig: EmailConfig & { host: string; from: string }): EmailAdapter {
  const transport = nodemailer.createTransport({
    host: emailConfig.host,
    port: emailConfig.port,
    secure: emailConfig.secure,
    auth: emailConfig.user ? { user: emailConfig.user, pass: emailConfig.password } : undefined,
  });

  return new EmailAdapter(transport, { from: emailConfig.from, subject: emailConfig.subject });
}
