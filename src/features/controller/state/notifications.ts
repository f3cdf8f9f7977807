export type NotificationLevel = 'info' | 'success' | 'warning' | 'error'

export type Notification = {
  message: string
  level: NotificationLevel
  createdAt: number
  autoDismissMs: number | null
}

// Errors stay until dismissed.
export const AUTO_DISMISS_MS: Record<NotificationLevel, number | null> = {
  info: 3000,
  success: 2000,
  warning: 5000,
  error: null,
}

export const createNotification = (message: string, level: NotificationLevel, now = Date.now()): Notification => ({
  message,
  level,
  createdAt: now,
  autoDismissMs: AUTO_DISMISS_MS[level],
})

export const isNotificationExpired = (notification: Notification, now = Date.now()) =>
  notification.autoDismissMs !== null && now - notification.createdAt >= notification.autoDismissMs
