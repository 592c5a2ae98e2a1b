import { DateTime } from '../types';

/**
 * Device time from a host Date, using the host's local time zone
 */
export function dateTimeFromDate(date: Date): DateTime {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    weekday: date.getDay(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds()
  };
}

export function dateTimeToDate(dt: DateTime): Date {
  return new Date(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second);
}

const pad2 = (n: number) => String(n).padStart(2, '0');

export function formatDateTime(dt: DateTime): string {
  return `${dt.year}-${pad2(dt.month)}-${pad2(dt.day)} ${pad2(dt.hour)}:${pad2(dt.minute)}:${pad2(dt.second)}`;
}

/**
 * Drift of the device clock since its last calibration, in PPM.
 * Positive when the device runs ahead of the host.
 *
 * @param calibratedAt - device time of the last calibration
 * @param deviceTime - device time read just now
 * @param hostTime - host time taken together with deviceTime
 */
export function computeDriftPpm(calibratedAt: DateTime, deviceTime: DateTime, hostTime: Date): number {
  const elapsedMs = hostTime.getTime() - dateTimeToDate(calibratedAt).getTime();
  if (elapsedMs <= 0) {
    throw new RangeError('Last calibration is not in the past');
  }
  const driftMs = dateTimeToDate(deviceTime).getTime() - hostTime.getTime();
  return (driftMs / elapsedMs) * 1e6;
}
