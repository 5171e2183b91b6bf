export { DesktopNotifier, NullNotifier } from './notifier.js';
export type { Notification, Notifier, NotifyCommand } from './notifier.js';
