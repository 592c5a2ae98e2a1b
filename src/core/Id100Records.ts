import { Appointment, DateTime, FlashClockConfig, FlashConfigPage, LastCalibration, StandbyConfig, StandbyWindow, VersionInfo } from '../types';
import { f32, word } from '../utils/codec';

// Wire record sizes in bytes
export const Sizes = {
  VERSION: 0x06,
  DATE_TIME: 0x07,
  MATRIX: 0x14,
  INTENSITY: 0x01,
  LAST_CALIBRATION: 0x0b,
  RTC_CALIBRATION: 0x04,
  STANDBY_WINDOW: 0x04,
  STANDBY: 0x1c,
  PAGE_NUMBER: 0x02,
  FLASH_PAGE_DATA: 0x40,
  FLASH_PAGE: 0x42,
  APPOINTMENT: 0x04,
  APPOINTMENTS: 0x40
} as const;

export const MATRIX_ROWS = 10;
export const MATRIX_COLUMNS = 11;
export const STANDBY_DAYS = 7;
export const APPOINTMENT_SLOTS = 16;

const YEAR_BASE = 2000;

function expectSize(name: string, buf: Buffer, size: number) {
  if (buf.length !== size) {
    throw new RangeError(`${name} must be ${size} bytes, got ${buf.length}`);
  }
}

// Single-byte field, checked here so callers get this package's RangeError
function putByte(b: Buffer, off: number, value: number, name: string) {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${name} ${value} does not fit in one byte`);
  }
  b[off] = value;
}

// Version (0x06): major, minor, revision as 16-bit words
export const VersionRecord = {
  parse(b: Buffer): VersionInfo {
    return {
      major: word.read(b, 0),
      minor: word.read(b, 2),
      revision: word.read(b, 4)
    };
  }
};

// Date/time (0x07): single bytes only, no byte order conversion
export const DateTimeRecord = {
  write(b: Buffer, off: number, dt: DateTime) {
    putByte(b, off, dt.year - YEAR_BASE, 'Year offset');
    putByte(b, off + 1, dt.month, 'Month');
    putByte(b, off + 2, dt.day, 'Day');
    putByte(b, off + 3, dt.weekday, 'Weekday');
    putByte(b, off + 4, dt.hour, 'Hour');
    putByte(b, off + 5, dt.minute, 'Minute');
    putByte(b, off + 6, dt.second, 'Second');
  },
  read(b: Buffer, off: number): DateTime {
    return {
      year: YEAR_BASE + b[off],
      month: b[off + 1],
      day: b[off + 2],
      weekday: b[off + 3],
      hour: b[off + 4],
      minute: b[off + 5],
      second: b[off + 6]
    };
  },
  toBytes(dt: DateTime): Buffer {
    const b = Buffer.alloc(Sizes.DATE_TIME);
    DateTimeRecord.write(b, 0, dt);
    return b;
  },
  parse(b: Buffer): DateTime { return DateTimeRecord.read(b, 0); }
};

/**
 * Preview matrix bitmap (0x14): two bytes per row, column c of row r
 * is bit (7 - c % 8) of byte (2r + c / 8). Transferred as-is.
 */
export const MatrixBitmap = {
  create(): Buffer { return Buffer.alloc(Sizes.MATRIX); },
  locate(row: number, column: number): [number, number] {
    if (!Number.isInteger(row) || row < 0 || row >= MATRIX_ROWS) {
      throw new RangeError(`Row ${row} outside 0-${MATRIX_ROWS - 1}`);
    }
    if (!Number.isInteger(column) || column < 0 || column >= MATRIX_COLUMNS) {
      throw new RangeError(`Column ${column} outside 0-${MATRIX_COLUMNS - 1}`);
    }
    return [row * 2 + (column >> 3), 0x80 >> (column & 7)];
  },
  getPixel(b: Buffer, row: number, column: number): boolean {
    const [off, mask] = MatrixBitmap.locate(row, column);
    return (b[off] & mask) !== 0;
  },
  setPixel(b: Buffer, row: number, column: number, on: boolean) {
    const [off, mask] = MatrixBitmap.locate(row, column);
    b[off] = on ? b[off] | mask : b[off] & ~mask;
  },
  toBytes(matrix: Buffer): Buffer {
    expectSize('Preview matrix', matrix, Sizes.MATRIX);
    return Buffer.from(matrix);
  }
};

export const IntensityRecord = {
  toBytes(intensity: number): Buffer {
    const b = Buffer.alloc(Sizes.INTENSITY);
    putByte(b, 0, intensity, 'Intensity');
    return b;
  },
  parse(b: Buffer): number { return b[0]; }
};

// Calibration: last calibration point (0x0b) and RTC correction value (0x04)
export const CalibrationRecord = {
  parseLast(b: Buffer): LastCalibration {
    return {
      dateTime: DateTimeRecord.read(b, 0),
      ppm: f32.read(b, Sizes.DATE_TIME)
    };
  },
  lastToBytes(cal: LastCalibration): Buffer {
    const b = Buffer.alloc(Sizes.LAST_CALIBRATION);
    DateTimeRecord.write(b, 0, cal.dateTime);
    f32.write(b, Sizes.DATE_TIME, cal.ppm);
    return b;
  },
  ppmToBytes(ppm: number): Buffer {
    const b = Buffer.alloc(Sizes.RTC_CALIBRATION);
    f32.write(b, 0, ppm);
    return b;
  },
  parsePpm(b: Buffer): number { return f32.read(b, 0); }
};

// Standby (0x1c): seven 4-byte windows, Sunday first
export const StandbyRecord = {
  toBytes(cfg: StandbyConfig): Buffer {
    if (cfg.days.length !== STANDBY_DAYS) {
      throw new RangeError(`Standby config needs ${STANDBY_DAYS} days, got ${cfg.days.length}`);
    }
    const b = Buffer.alloc(Sizes.STANDBY);
    cfg.days.forEach((w, i) => {
      const off = i * Sizes.STANDBY_WINDOW;
      putByte(b, off, w.startHour, 'Standby start hour');
      putByte(b, off + 1, w.startMinute, 'Standby start minute');
      putByte(b, off + 2, w.endHour, 'Standby end hour');
      putByte(b, off + 3, w.endMinute, 'Standby end minute');
    });
    return b;
  },
  parse(b: Buffer): StandbyConfig {
    const days: StandbyWindow[] = [];
    for (let i = 0; i < STANDBY_DAYS; i++) {
      const off = i * Sizes.STANDBY_WINDOW;
      days.push({ startHour: b[off], startMinute: b[off + 1], endHour: b[off + 2], endMinute: b[off + 3] });
    }
    return { days };
  }
};

export const PageNumberRecord = {
  toBytes(page: number): Buffer {
    const b = Buffer.alloc(Sizes.PAGE_NUMBER);
    word.write(b, 0, page);
    return b;
  },
  parse(b: Buffer, off = 0): number { return word.read(b, off); }
};

// Flash page (0x42): page number word followed by the page contents
export const FlashPageRecord = {
  toBytes(page: FlashClockConfig): Buffer {
    expectSize('Flash page data', page.data, Sizes.FLASH_PAGE_DATA);
    const b = Buffer.alloc(Sizes.FLASH_PAGE);
    word.write(b, 0, page.pageNumber);
    page.data.copy(b, Sizes.PAGE_NUMBER);
    return b;
  },
  parse(b: Buffer): FlashConfigPage {
    return {
      pageNumber: word.read(b, 0),
      data: Buffer.from(b.subarray(Sizes.PAGE_NUMBER, Sizes.FLASH_PAGE))
    };
  }
};

// Appointments (0x40): sixteen 4-byte slots, unused slots are zero
export const AppointmentsRecord = {
  toBytes(list: Appointment[]): Buffer {
    if (list.length > APPOINTMENT_SLOTS) {
      throw new RangeError(`At most ${APPOINTMENT_SLOTS} appointments fit, got ${list.length}`);
    }
    const b = Buffer.alloc(Sizes.APPOINTMENTS);
    list.forEach((a, i) => {
      const off = i * Sizes.APPOINTMENT;
      putByte(b, off, a.month, 'Appointment month');
      putByte(b, off + 1, a.day, 'Appointment day');
      putByte(b, off + 2, a.hour, 'Appointment hour');
      putByte(b, off + 3, a.minute, 'Appointment minute');
    });
    return b;
  },
  parse(b: Buffer): Appointment[] {
    const list: Appointment[] = [];
    for (let i = 0; i < APPOINTMENT_SLOTS; i++) {
      const off = i * Sizes.APPOINTMENT;
      list.push({ month: b[off], day: b[off + 1], hour: b[off + 2], minute: b[off + 3] });
    }
    return list;
  },
  isEmpty(a: Appointment): boolean { return a.month === 0; }
};
