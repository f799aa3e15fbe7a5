/**
 * Local Notifications
 *
 * Port for the device notification scheduler. Delivery is best-effort:
 * scheduling failures are logged and never reach the caller.
 */

export interface NotificationScheduler {
  schedule(title: string, body: string, delayMs: number): void | Promise<void>;
}

export const noopNotificationScheduler: NotificationScheduler = {
  schedule: () => undefined,
};

export function scheduleSafely(
  scheduler: NotificationScheduler,
  title: string,
  body: string,
  delayMs: number
): void {
  try {
    const pending = scheduler.schedule(title, body, delayMs);
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        console.warn('[notifications] Failed to schedule notification:', error);
      });
    }
  } catch (error) {
    console.warn('[notifications] Failed to schedule notification:', error);
  }
}
