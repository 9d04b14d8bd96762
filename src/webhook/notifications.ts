import { z } from "zod";

const NotificationSchema = z.object({
  resource: z.string().min(1),
  subscriptionId: z.string().optional(),
  clientState: z.string().optional(),
  changeType: z.string().optional(),
});

const BatchSchema = z.object({
  value: z.array(z.unknown()),
});

export type GraphNotification = z.infer<typeof NotificationSchema>;

export interface NotificationBatch {
  notifications: GraphNotification[];
  /** Entries of `value` that were not objects with a non-empty `resource`. */
  skipped: number;
}

/**
 * Reads a change-notification body. Throws only on unparsable JSON; any other
 * shape yields an empty batch.
 */
export function parseNotificationBatch(body: unknown): NotificationBatch {
  let payload = body;
  if (typeof body === "string") {
    payload = body.trim() ? JSON.parse(body) : undefined;
  }

  const batch = BatchSchema.safeParse(payload);
  if (!batch.success) {
    return { notifications: [], skipped: 0 };
  }

  const notifications: GraphNotification[] = [];
  let skipped = 0;
  for (const entry of batch.data.value) {
    const parsed = NotificationSchema.safeParse(entry);
    if (parsed.success) {
      notifications.push(parsed.data);
    } else {
      skipped += 1;
    }
  }
  return { notifications, skipped };
}
