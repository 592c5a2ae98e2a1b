import { CalibrationRecord, Sizes } from '../src/core/Id100Records';
import { clampPpm } from '../src/device/Id100Commands';
import { Id100Control } from '../src/device/Id100Control';
import { Id100NotConnectedError, Id100ProtocolError } from '../src/utils/errors';
import { FakeLink } from './fakes/FakeLink';

async function connected(link: FakeLink): Promise<Id100Control> {
  const clock = new Id100Control({ link });
  await clock.connect();
  return clock;
}

const sampleTime = { year: 2024, month: 5, day: 6, weekday: 1, hour: 12, minute: 34, second: 56 };
const pageData = Buffer.alloc(Sizes.FLASH_PAGE_DATA, 0xa5);

// Every catalog operation with its tag and fixed response size
const operations: Array<[string, string, number, (c: Id100Control) => Promise<unknown>]> = [
  ['getVersion', 'v', Sizes.VERSION, (c) => c.getVersion()],
  ['getDateTime', 't', Sizes.DATE_TIME, (c) => c.getDateTime()],
  ['setDateTime', 'T', 0, (c) => c.setDateTime(sampleTime)],
  ['setNormalMode', 'A', 0, (c) => c.setNormalMode()],
  ['setPreviewMode', 'a', 0, (c) => c.setPreviewMode()],
  ['factoryReset', 'X', 0, (c) => c.factoryReset()],
  ['activateBootloader', '!', 0, (c) => c.activateBootloader()],
  ['setPreviewMatrix', 'D', 0, (c) => c.setPreviewMatrix(Buffer.alloc(Sizes.MATRIX))],
  ['getIntensity', 'b', Sizes.INTENSITY, (c) => c.getIntensity()],
  ['setIntensity', 'B', 0, (c) => c.setIntensity(7)],
  ['getLastCalibration', 'c', Sizes.LAST_CALIBRATION, (c) => c.getLastCalibration()],
  ['setRtcCalibration', 'C', 0, (c) => c.setRtcCalibration(1.5)],
  ['getStandby', 's', Sizes.STANDBY, (c) => c.getStandby()],
  ['setStandby', 'S', 0, (c) => c.setStandby({ days: Array(7).fill({ startHour: 0, startMinute: 0, endHour: 0, endMinute: 0 }) })],
  ['getFlashConfigPage', 'f', Sizes.FLASH_PAGE, (c) => c.getFlashConfigPage(0)],
  ['eraseFlashConfigSector', 'E', Sizes.PAGE_NUMBER, (c) => c.eraseFlashConfigSector(0)],
  ['setFlashClockConfig', 'F', Sizes.PAGE_NUMBER, (c) => c.setFlashClockConfig({ pageNumber: 0, data: pageData })],
  ['getAppointments', 'r', Sizes.APPOINTMENTS, (c) => c.getAppointments()],
  ['setAppointments', 'R', 0, (c) => c.setAppointments([])]
];

describe('Id100Control catalog', () => {
  test.each(operations)('%s succeeds when the device echoes tag and length', async (_name, tag, size, call) => {
    const link = new FakeLink().reply(tag, Buffer.alloc(size));
    const clock = await connected(link);
    await call(clock);
    expect(link.sent).toHaveLength(1);
    expect(link.sent[0].command).toBe(tag.charCodeAt(0));
  });

  test.each(operations)('%s fails on a foreign answer tag', async (_name, _tag, size, call) => {
    const link = new FakeLink().reply('Z', Buffer.alloc(size, 0xff));
    const clock = await connected(link);
    const err = await call(clock).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(Id100ProtocolError);
    expect(err).toMatchObject({ kind: 'tag-mismatch', received: 0x5a, message: "Invalid answer command received: 'Z'" });
  });

  test.each(operations)('%s fails on a payload longer than expected', async (_name, tag, size, call) => {
    const link = new FakeLink().reply(tag, Buffer.alloc(size + 1));
    const clock = await connected(link);
    await expect(call(clock)).rejects.toMatchObject({
      kind: 'length-mismatch',
      expected: size,
      received: size + 1,
      message: `Invalid length received: ${size + 1}`
    });
  });

  test('a short payload is a length mismatch', async () => {
    const link = new FakeLink().reply('v', [0x00, 0x01]);
    const clock = await connected(link);
    await expect(clock.getVersion()).rejects.toMatchObject({ kind: 'length-mismatch', expected: 6, received: 2 });
  });

  test('operations require a connection', async () => {
    const link = new FakeLink();
    const clock = new Id100Control({ link });
    await expect(clock.getVersion()).rejects.toBeInstanceOf(Id100NotConnectedError);
    expect(link.sent).toHaveLength(0);
  });

  test('overlapping connects wait for the same link connect', async () => {
    let open: () => void = () => undefined;
    const link = new FakeLink();
    link.connect = () => new Promise<void>((resolve) => {
      link.connectCalls++;
      open = resolve;
    });
    const clock = new Id100Control({ link });
    const first = clock.connect();
    let secondDone = false;
    const second = clock.connect().then(() => { secondDone = true; });
    await Promise.resolve();
    await Promise.resolve();
    expect(secondDone).toBe(false);
    expect(clock.isConnected).toBe(false);
    open();
    await Promise.all([first, second]);
    expect(secondDone).toBe(true);
    expect(clock.isConnected).toBe(true);
    expect(link.connectCalls).toBe(1);
  });

  test('connect and disconnect reach the link once each', async () => {
    const link = new FakeLink();
    const clock = new Id100Control({ link });
    await clock.connect();
    await clock.connect();
    expect(clock.isConnected).toBe(true);
    await clock.disconnect();
    await clock.disconnect();
    expect(link.connectCalls).toBe(1);
    expect(link.disconnectCalls).toBe(1);
    expect(clock.isConnected).toBe(false);
  });
});

describe('Id100Control operations', () => {
  test('version words are converted from big-endian', async () => {
    const link = new FakeLink().reply('v', [0x00, 0x01, 0x00, 0x02, 0x00, 0x03]);
    const clock = await connected(link);
    await expect(clock.getVersion()).resolves.toEqual({ major: 1, minor: 2, revision: 3 });
    expect(link.sent[0].payload.length).toBe(0);
  });

  test('date/time is sent and read verbatim', async () => {
    const link = new FakeLink().reply('T').reply('t', [24, 5, 6, 1, 12, 34, 56]);
    const clock = await connected(link);
    await clock.setDateTime(sampleTime);
    expect([...link.sent[0].payload]).toEqual([24, 5, 6, 1, 12, 34, 56]);
    await expect(clock.getDateTime()).resolves.toEqual(sampleTime);
  });

  test('intensity round trip', async () => {
    const link = new FakeLink().reply('B').reply('b', [42]);
    const clock = await connected(link);
    await clock.setIntensity(42);
    expect([...link.sent[0].payload]).toEqual([42]);
    await expect(clock.getIntensity()).resolves.toBe(42);
  });

  test('out-of-range intensity is rejected before sending', async () => {
    const link = new FakeLink().reply('B');
    const clock = await connected(link);
    await expect(clock.setIntensity(300)).rejects.toThrow('Intensity 300 does not fit in one byte');
    expect(link.sent).toHaveLength(0);
  });

  test('preview matrix is sent as-is', async () => {
    const link = new FakeLink().reply('D');
    const clock = await connected(link);
    const matrix = Buffer.alloc(Sizes.MATRIX);
    matrix[5] = 0x81;
    await clock.setPreviewMatrix(matrix);
    expect(link.sent[0].payload.equals(matrix)).toBe(true);
  });

  test('wrong-sized matrix is rejected before sending', async () => {
    const link = new FakeLink().reply('D');
    const clock = await connected(link);
    await expect(clock.setPreviewMatrix(Buffer.alloc(3))).rejects.toBeInstanceOf(RangeError);
    expect(link.sent).toHaveLength(0);
  });

  test('last calibration is decoded', async () => {
    const payload = CalibrationRecord.lastToBytes({ dateTime: sampleTime, ppm: -12.5 });
    const link = new FakeLink().reply('c', payload);
    const clock = await connected(link);
    await expect(clock.getLastCalibration()).resolves.toEqual({ dateTime: sampleTime, ppm: -12.5 });
  });

  test.each([
    [250.0, 189.0],
    [-250.0, -189.0],
    [10.0, 10.0],
    [189.0, 189.0],
    [-189.0, -189.0]
  ])('RTC calibration %p is sent as %p', async (input, sent) => {
    const link = new FakeLink().reply('C');
    const clock = await connected(link);
    await clock.setRtcCalibration(input);
    expect(link.sent[0].payload.length).toBe(Sizes.RTC_CALIBRATION);
    expect(CalibrationRecord.parsePpm(link.sent[0].payload)).toBe(sent);
  });

  test('clampPpm stays within ±189 and keeps in-range values', () => {
    for (const p of [-1e9, -189.5, -189, -0.25, 0, 3.75, 188.999, 189, 189.0001, Infinity, -Infinity]) {
      const c = clampPpm(p);
      expect(c).toBeGreaterThanOrEqual(-189);
      expect(c).toBeLessThanOrEqual(189);
      if (Math.abs(p) <= 189) expect(c).toBe(p);
    }
    expect(() => clampPpm(NaN)).toThrow(RangeError);
  });

  test('standby schedule', async () => {
    const payload = Buffer.alloc(Sizes.STANDBY);
    payload.set([23, 0, 6, 30], 4);
    const link = new FakeLink().reply('s', payload);
    const clock = await connected(link);
    const standby = await clock.getStandby();
    expect(standby.days).toHaveLength(7);
    expect(standby.days[1]).toEqual({ startHour: 23, startMinute: 0, endHour: 6, endMinute: 30 });
  });

  test('flash page request carries a big-endian page number', async () => {
    const response = Buffer.concat([Buffer.from([0x01, 0x05]), pageData]);
    const link = new FakeLink().reply('f', response);
    const clock = await connected(link);
    const page = await clock.getFlashConfigPage(0x0105);
    expect([...link.sent[0].payload]).toEqual([0x01, 0x05]);
    expect(page.pageNumber).toBe(0x0105);
    expect(page.data.equals(pageData)).toBe(true);
  });

  test('flash page echo mismatch names the received page', async () => {
    const response = Buffer.concat([Buffer.from([0x00, 0x07]), pageData]);
    const link = new FakeLink().reply('f', response);
    const clock = await connected(link);
    await expect(clock.getFlashConfigPage(5)).rejects.toMatchObject({
      kind: 'echo-mismatch',
      expected: 5,
      received: 7,
      message: 'Bad page number received: 7'
    });
  });

  test('sector erase checks the echoed start page', async () => {
    const link = new FakeLink().reply('E', [0x00, 0x10]).reply('E', [0x00, 0x11]);
    const clock = await connected(link);
    await clock.eraseFlashConfigSector(16);
    expect([...link.sent[0].payload]).toEqual([0x00, 0x10]);
    await expect(clock.eraseFlashConfigSector(16)).rejects.toMatchObject({ kind: 'echo-mismatch', received: 17 });
  });

  test('flash clock config goes out big-endian and leaves the caller record intact', async () => {
    const link = new FakeLink().reply('F', [0x00, 0x2a]);
    const clock = await connected(link);
    const config = { pageNumber: 42, data: pageData };
    await clock.setFlashClockConfig(config);
    expect([...link.sent[0].payload.subarray(0, 2)]).toEqual([0x00, 0x2a]);
    expect(link.sent[0].payload.length).toBe(Sizes.FLASH_PAGE);
    expect(config.pageNumber).toBe(42);
  });

  test('flash clock config echo mismatch', async () => {
    const link = new FakeLink().reply('F', [0x00, 0x2b]);
    const clock = await connected(link);
    await expect(clock.setFlashClockConfig({ pageNumber: 42, data: pageData }))
      .rejects.toThrow('Bad page number received: 43');
  });

  test('appointments round trip', async () => {
    const table = Buffer.alloc(Sizes.APPOINTMENTS);
    table.set([12, 24, 18, 0], 0);
    const link = new FakeLink().reply('r', table).reply('R');
    const clock = await connected(link);
    const list = await clock.getAppointments();
    expect(list[0]).toEqual({ month: 12, day: 24, hour: 18, minute: 0 });
    await clock.setAppointments(list);
    expect(link.sent[1].payload.equals(table)).toBe(true);
  });
});
