/**
 * Time and identity helpers shared by the audit log and results export
 */

import * as os from 'os';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time stamp for file names
 * @example
 * fileTimestamp(new Date(2025, 0, 31, 9, 5, 7)) // returns '20250131_090507'
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Local calendar day, used for daily log rotation
 * @example
 * dayStamp(new Date(2025, 0, 31)) // returns '2025-01-31'
 */
export function dayStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * OS user name, or a placeholder when the platform cannot tell
 */
export function currentUser(): string {
  try {
    return os.userInfo().username || 'unknown_user';
  } catch {
    return 'unknown_user';
  }
}
