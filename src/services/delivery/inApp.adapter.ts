import type { DeliveryAdapter, DeliveryResult } from "@/services/delivery/adapter.types";

// In-app notifications are delivered by being recorded; the stored record is the inbox entry.
export class InAppAdapter implements DeliveryAdapter {
  readonly channel = "in_app" as const;

  async deliver(): Promise<DeliveryResult> {
    return { ok: true };
  }
}
