// Export types (records, Link, Operation)
export * from './types';

// Export main class
export { Id100Control } from './device/Id100Control';

// Export the operation catalog and constants
export { Id100Commands, clampPpm } from './device/Id100Commands';
export { CommandTag, PPM_LIMIT, DEFAULT_UDP_PORT, DEFAULT_TIMEOUT_MS, WEEKDAY_NAMES } from './device/Id100Constants';

// Export low-level building blocks (for custom links and tooling)
export { CommandChannel } from './core/CommandChannel';
export {
  Sizes,
  MATRIX_ROWS,
  MATRIX_COLUMNS,
  STANDBY_DAYS,
  APPOINTMENT_SLOTS,
  VersionRecord,
  DateTimeRecord,
  MatrixBitmap,
  IntensityRecord,
  CalibrationRecord,
  StandbyRecord,
  PageNumberRecord,
  FlashPageRecord,
  AppointmentsRecord
} from './core/Id100Records';

// Export transport
export { UdpLink, UdpLinkOptions, DatagramSocket, encodeDatagram, decodeDatagram } from './transport/UdpLink';

// Export utilities
export { HOST_ENDIANNESS, swap16, toWireOrder16, fromWireOrder16, hex, parseHex, tagToString } from './utils/codec';
export { dateTimeFromDate, dateTimeToDate, formatDateTime, computeDriftPpm } from './utils/time';
export {
  Id100Error,
  Id100ProtocolError,
  Id100BusyError,
  Id100NotConnectedError,
  Id100TimeoutError,
  ProtocolErrorKind
} from './utils/errors';
