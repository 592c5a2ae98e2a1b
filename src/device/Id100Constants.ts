/**
 * ID100 command tags and protocol limits
 */

/**
 * Command tags. Every tag is a single ASCII character, and the device
 * answers each request with a frame carrying the same tag.
 */
export const CommandTag = {
  GET_VERSION: 0x76,          // 'v'
  GET_DATE_TIME: 0x74,        // 't'
  SET_DATE_TIME: 0x54,        // 'T'
  SET_NORMAL_MODE: 0x41,      // 'A'
  SET_PREVIEW_MODE: 0x61,     // 'a'
  FACTORY_RESET: 0x58,        // 'X'
  ACTIVATE_BOOTLOADER: 0x21,  // '!'
  SET_PREVIEW_MATRIX: 0x44,   // 'D'
  GET_INTENSITY: 0x62,        // 'b'
  SET_INTENSITY: 0x42,        // 'B'
  GET_LAST_CALIBRATION: 0x63, // 'c'
  SET_RTC_CALIBRATION: 0x43,  // 'C'
  GET_STANDBY: 0x73,          // 's'
  SET_STANDBY: 0x53,          // 'S'
  GET_FLASH_CONFIG_PAGE: 0x66,     // 'f'
  ERASE_FLASH_CONFIG_SECTOR: 0x45, // 'E'
  SET_FLASH_CLOCK_CONFIG: 0x46,    // 'F'
  GET_APPOINTMENTS: 0x72,     // 'r'
  SET_APPOINTMENTS: 0x52      // 'R'
} as const;

/**
 * Largest RTC correction the device accepts, in PPM (either sign)
 */
export const PPM_LIMIT = 189.0;

export const DEFAULT_UDP_PORT = 4210;
export const DEFAULT_TIMEOUT_MS = 3000;

export const WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
