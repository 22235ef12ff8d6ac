export const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const

export type Weekday = (typeof WEEKDAYS)[number]

export const DATE_FORMAT = 'yyyy-MM-dd'
export const DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm'
export const BACKUP_STAMP_FORMAT = 'yyyyMMdd_HHmmss'

export const DEFAULT_DATA_FILE = 'data.json'
export const DEFAULT_BACKUP_DIR = 'backups'
export const DEFAULT_ALERT_THRESHOLD = 75
export const DEFAULT_UPCOMING_DAYS = 7
