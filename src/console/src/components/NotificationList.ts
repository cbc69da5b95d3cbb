import type { Notification } from '../../../client/command-tracker.js';

export function renderNotifications(notifications: Notification[], limit = 5): string {
  return notifications.slice(-limit).map((n) => `[${n.level}] ${n.title}: ${n.message}`).join('\n');
}
