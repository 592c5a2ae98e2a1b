/**
 * One framed message in either direction: a command tag and its payload
 */
export interface LinkFrame {
  command: number;
  payload: Buffer;
}

/**
 * Framed transport between host and device.
 * One frame is sent per request, and exactly one frame is expected back.
 */
export interface Link {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(command: number, payload: Buffer): Promise<void>;
  receive(): Promise<LinkFrame>;
}

export interface Id100Options {
  link: Link;
}

/**
 * A catalog entry: fixed command tag, fixed payload sizes, and the
 * encode/decode hooks that run before sending and after receiving.
 */
export interface Operation<Req, Res> {
  readonly name: string;
  readonly command: number;
  readonly requestSize: number;
  readonly responseSize: number;
  encode(request: Req): Buffer;
  /**
   * Decode the validated response payload. Receives the original request
   * so echoed values can be checked against it.
   */
  decode(response: Buffer, request: Req): Res;
}

// ============================================================================
// Device records
// ============================================================================

export interface VersionInfo {
  major: number;
  minor: number;
  revision: number;
}

/**
 * Wall-clock time as kept by the device RTC (no time zone)
 */
export interface DateTime {
  /** Full year, 2000-2255 */
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  /** 0 = Sunday ... 6 = Saturday */
  weekday: number;
  hour: number;
  minute: number;
  second: number;
}

export interface LastCalibration {
  /** When the RTC was last calibrated */
  dateTime: DateTime;
  /** Correction applied at that time, in parts per million */
  ppm: number;
}

/**
 * Standby window for one weekday. Equal start and end mean no standby on that day.
 */
export interface StandbyWindow {
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
}

export interface StandbyConfig {
  /** Seven windows, Sunday first */
  days: StandbyWindow[];
}

export interface FlashConfigPage {
  pageNumber: number;
  data: Buffer;
}

/**
 * Clock configuration to be written to a flash page
 */
export interface FlashClockConfig {
  pageNumber: number;
  data: Buffer;
}

/**
 * One appointment slot. A month of 0 marks an unused slot.
 */
export interface Appointment {
  month: number;
  day: number;
  hour: number;
  minute: number;
}
