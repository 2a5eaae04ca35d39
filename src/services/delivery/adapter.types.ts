import type { NotificationChannel } from "@/types/notification";

export type DeliveryResult = { ok: true; providerMessageId?: string } | { ok: false; reason: string };

/**
 * Expected failures (bad destination, unreachable provider, remote
 * rejection) come back as `{ ok: false }`; adapters do not throw for them.
 */
export interface DeliveryAdapter {
  readonly channel: NotificationChannel;
  deliver(destination: string | null, message: string): Promise<DeliveryResult>;
}

export type AdapterRegistry = {
  readonly [C in NotificationChannel]: DeliveryAdapter;
};
