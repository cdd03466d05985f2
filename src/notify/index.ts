/**
 * @entry Notify 桌面通知模块
 */

export {
  showDesktopNotification,
  NOTIFY_TEXT_ENV,
  NOTIFY_TITLE_ENV,
} from './showDesktopNotification.js'
export { buildNotificationText } from './buildNotificationText.js'
