// Catalog of ID100 operations: tag, payload sizes, and the hooks around each request

import {
  AppointmentsRecord,
  CalibrationRecord,
  DateTimeRecord,
  FlashPageRecord,
  IntensityRecord,
  MatrixBitmap,
  PageNumberRecord,
  Sizes,
  StandbyRecord,
  VersionRecord
} from '../core/Id100Records';
import { Appointment, DateTime, FlashClockConfig, FlashConfigPage, LastCalibration, Operation, StandbyConfig, VersionInfo } from '../types';
import { Id100ProtocolError } from '../utils/errors';
import { CommandTag, PPM_LIMIT } from './Id100Constants';

const EMPTY = Buffer.alloc(0);
const noPayload = () => EMPTY;
const noAnswer = () => undefined;

function define<Req, Res>(op: Operation<Req, Res>): Operation<Req, Res> {
  return op;
}

/**
 * Saturate a PPM correction to the range the device accepts
 */
export function clampPpm(ppm: number): number {
  if (Number.isNaN(ppm)) throw new RangeError('PPM value is not a number');
  if (ppm > PPM_LIMIT) return PPM_LIMIT;
  if (ppm < -PPM_LIMIT) return -PPM_LIMIT;
  return ppm;
}

function expectEcho(command: number, expected: number, received: number) {
  if (received !== expected) {
    throw Id100ProtocolError.echoMismatch(command, expected, received);
  }
}

// Pure signaling: no payload in either direction
function signal(name: string, command: number): Operation<void, void> {
  return define<void, void>({ name, command, requestSize: 0, responseSize: 0, encode: noPayload, decode: noAnswer });
}

export const Id100Commands = {
  getVersion: define<void, VersionInfo>({
    name: 'getVersion',
    command: CommandTag.GET_VERSION,
    requestSize: 0,
    responseSize: Sizes.VERSION,
    encode: noPayload,
    decode: VersionRecord.parse
  }),

  getDateTime: define<void, DateTime>({
    name: 'getDateTime',
    command: CommandTag.GET_DATE_TIME,
    requestSize: 0,
    responseSize: Sizes.DATE_TIME,
    encode: noPayload,
    decode: DateTimeRecord.parse
  }),
  setDateTime: define<DateTime, void>({
    name: 'setDateTime',
    command: CommandTag.SET_DATE_TIME,
    requestSize: Sizes.DATE_TIME,
    responseSize: 0,
    encode: DateTimeRecord.toBytes,
    decode: noAnswer
  }),

  setNormalMode: signal('setNormalMode', CommandTag.SET_NORMAL_MODE),
  setPreviewMode: signal('setPreviewMode', CommandTag.SET_PREVIEW_MODE),
  factoryReset: signal('factoryReset', CommandTag.FACTORY_RESET),
  activateBootloader: signal('activateBootloader', CommandTag.ACTIVATE_BOOTLOADER),

  setPreviewMatrix: define<Buffer, void>({
    name: 'setPreviewMatrix',
    command: CommandTag.SET_PREVIEW_MATRIX,
    requestSize: Sizes.MATRIX,
    responseSize: 0,
    encode: MatrixBitmap.toBytes,
    decode: noAnswer
  }),

  getIntensity: define<void, number>({
    name: 'getIntensity',
    command: CommandTag.GET_INTENSITY,
    requestSize: 0,
    responseSize: Sizes.INTENSITY,
    encode: noPayload,
    decode: IntensityRecord.parse
  }),
  setIntensity: define<number, void>({
    name: 'setIntensity',
    command: CommandTag.SET_INTENSITY,
    requestSize: Sizes.INTENSITY,
    responseSize: 0,
    encode: IntensityRecord.toBytes,
    decode: noAnswer
  }),

  getLastCalibration: define<void, LastCalibration>({
    name: 'getLastCalibration',
    command: CommandTag.GET_LAST_CALIBRATION,
    requestSize: 0,
    responseSize: Sizes.LAST_CALIBRATION,
    encode: noPayload,
    decode: CalibrationRecord.parseLast
  }),
  setRtcCalibration: define<number, void>({
    name: 'setRtcCalibration',
    command: CommandTag.SET_RTC_CALIBRATION,
    requestSize: Sizes.RTC_CALIBRATION,
    responseSize: 0,
    encode: (ppm) => CalibrationRecord.ppmToBytes(clampPpm(ppm)),
    decode: noAnswer
  }),

  getStandby: define<void, StandbyConfig>({
    name: 'getStandby',
    command: CommandTag.GET_STANDBY,
    requestSize: 0,
    responseSize: Sizes.STANDBY,
    encode: noPayload,
    decode: StandbyRecord.parse
  }),
  setStandby: define<StandbyConfig, void>({
    name: 'setStandby',
    command: CommandTag.SET_STANDBY,
    requestSize: Sizes.STANDBY,
    responseSize: 0,
    encode: StandbyRecord.toBytes,
    decode: noAnswer
  }),

  // f: request a page, the answer echoes the page number in front of the contents
  getFlashConfigPage: define<number, FlashConfigPage>({
    name: 'getFlashConfigPage',
    command: CommandTag.GET_FLASH_CONFIG_PAGE,
    requestSize: Sizes.PAGE_NUMBER,
    responseSize: Sizes.FLASH_PAGE,
    encode: PageNumberRecord.toBytes,
    decode: (response, pageNumber) => {
      const page = FlashPageRecord.parse(response);
      expectEcho(CommandTag.GET_FLASH_CONFIG_PAGE, pageNumber, page.pageNumber);
      return page;
    }
  }),

  // E: erase the sector starting at a page, the answer is the erased start page
  eraseFlashConfigSector: define<number, void>({
    name: 'eraseFlashConfigSector',
    command: CommandTag.ERASE_FLASH_CONFIG_SECTOR,
    requestSize: Sizes.PAGE_NUMBER,
    responseSize: Sizes.PAGE_NUMBER,
    encode: PageNumberRecord.toBytes,
    decode: (response, startPage) => {
      expectEcho(CommandTag.ERASE_FLASH_CONFIG_SECTOR, startPage, PageNumberRecord.parse(response));
    }
  }),

  // F: the record is encoded into a fresh buffer, so the caller's page number stays in host order
  setFlashClockConfig: define<FlashClockConfig, void>({
    name: 'setFlashClockConfig',
    command: CommandTag.SET_FLASH_CLOCK_CONFIG,
    requestSize: Sizes.FLASH_PAGE,
    responseSize: Sizes.PAGE_NUMBER,
    encode: FlashPageRecord.toBytes,
    decode: (response, config) => {
      expectEcho(CommandTag.SET_FLASH_CLOCK_CONFIG, config.pageNumber, PageNumberRecord.parse(response));
    }
  }),

  getAppointments: define<void, Appointment[]>({
    name: 'getAppointments',
    command: CommandTag.GET_APPOINTMENTS,
    requestSize: 0,
    responseSize: Sizes.APPOINTMENTS,
    encode: noPayload,
    decode: AppointmentsRecord.parse
  }),
  setAppointments: define<Appointment[], void>({
    name: 'setAppointments',
    command: CommandTag.SET_APPOINTMENTS,
    requestSize: Sizes.APPOINTMENTS,
    responseSize: 0,
    encode: AppointmentsRecord.toBytes,
    decode: noAnswer
  })
};
