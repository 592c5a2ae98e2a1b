#!/usr/bin/env node
/**
 * id100 command-line utility
 */

import { Command } from 'commander';
import { AppointmentsRecord, Sizes } from './core/Id100Records';
import { clampPpm } from './device/Id100Commands';
import { DEFAULT_TIMEOUT_MS, DEFAULT_UDP_PORT, WEEKDAY_NAMES } from './device/Id100Constants';
import { Id100Control } from './device/Id100Control';
import { UdpLink, UdpLinkOptions } from './transport/UdpLink';
import { hex, parseHex } from './utils/codec';
import { computeDriftPpm, dateTimeFromDate, formatDateTime } from './utils/time';

export interface CliDeps {
  openDevice: (options: UdpLinkOptions) => Id100Control;
  print: (line: string) => void;
  now: () => Date;
}

const defaultDeps: CliDeps = {
  openDevice: (options) => new Id100Control({ link: new UdpLink(options) }),
  print: (line) => console.log(line),
  now: () => new Date()
};

type GlobalOptions = {
  host: string;
  port: string;
  timeout: string;
};

function parseInteger(text: string, what: string, max: number): number {
  const n = Number(text);
  if (!Number.isInteger(n) || n < 0 || n > max) {
    throw new RangeError(`Invalid ${what}: ${text}`);
  }
  return n;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('id100')
    .description('ID100 clock/display utility')
    .option('--host <host>', 'device address', process.env.ID100_HOST || '192.168.4.1')
    .option('--port <port>', 'device UDP port', process.env.ID100_PORT || String(DEFAULT_UDP_PORT))
    .option('--timeout <ms>', 'answer timeout in milliseconds', process.env.ID100_TIMEOUT || String(DEFAULT_TIMEOUT_MS));

  const withDevice = async (task: (device: Id100Control) => Promise<void>) => {
    const opts = program.opts<GlobalOptions>();
    const device = deps.openDevice({
      host: opts.host,
      port: parseInteger(opts.port, 'port', 0xffff),
      timeoutMs: parseInteger(opts.timeout, 'timeout', 600000)
    });
    await device.connect();
    try {
      await task(device);
    } finally {
      await device.disconnect();
    }
  };

  program.command('version')
    .description('show the firmware version')
    .action(() => withDevice(async (device) => {
      const v = await device.getVersion();
      deps.print(`${v.major}.${v.minor}.${v.revision}`);
    }));

  program.command('time')
    .description('show the device date and time')
    .action(() => withDevice(async (device) => {
      const dt = await device.getDateTime();
      deps.print(`${formatDateTime(dt)} ${WEEKDAY_NAMES[dt.weekday] ?? '?'}`);
    }));

  program.command('sync-time')
    .description('set the device clock to the host clock')
    .action(() => withDevice(async (device) => {
      const dt = dateTimeFromDate(deps.now());
      await device.setDateTime(dt);
      deps.print(`Time set to ${formatDateTime(dt)}`);
    }));

  program.command('set-time <datetime>')
    .description('set the device clock, e.g. 2024-03-01T12:00:00')
    .action((text: string) => withDevice(async (device) => {
      const date = new Date(text);
      if (Number.isNaN(date.getTime())) throw new RangeError(`Invalid date: ${text}`);
      const dt = dateTimeFromDate(date);
      await device.setDateTime(dt);
      deps.print(`Time set to ${formatDateTime(dt)}`);
    }));

  program.command('normal')
    .description('leave preview mode')
    .action(() => withDevice((device) => device.setNormalMode()));

  program.command('preview')
    .description('switch to preview mode')
    .action(() => withDevice((device) => device.setPreviewMode()));

  program.command('matrix <hex>')
    .description(`upload a ${Sizes.MATRIX}-byte preview bitmap`)
    .action((text: string) => withDevice((device) => device.setPreviewMatrix(parseHex(text))));

  program.command('factory-reset')
    .description('restore factory settings')
    .action(() => withDevice((device) => device.factoryReset()));

  program.command('bootloader')
    .description('restart into the bootloader')
    .action(() => withDevice((device) => device.activateBootloader()));

  program.command('intensity [value]')
    .description('show or set the standard intensity')
    .action((value: string | undefined) => withDevice(async (device) => {
      if (value === undefined) {
        deps.print(String(await device.getIntensity()));
        return;
      }
      await device.setIntensity(parseInteger(value, 'intensity', 0xff));
    }));

  program.command('calibration')
    .description('show the last RTC calibration')
    .action(() => withDevice(async (device) => {
      const cal = await device.getLastCalibration();
      deps.print(`${formatDateTime(cal.dateTime)} ${cal.ppm.toFixed(3)} ppm`);
    }));

  program.command('calibrate <ppm>')
    .description('set the RTC correction in PPM')
    .action((text: string) => withDevice(async (device) => {
      const ppm = Number(text);
      if (Number.isNaN(ppm)) throw new RangeError(`Invalid PPM value: ${text}`);
      await device.setRtcCalibration(ppm);
      deps.print(`Calibration set to ${clampPpm(ppm).toFixed(3)} ppm`);
    }));

  program.command('drift')
    .description('measure drift since the last calibration and correct it')
    .action(() => withDevice(async (device) => {
      const cal = await device.getLastCalibration();
      const deviceTime = await device.getDateTime();
      const ppm = computeDriftPpm(cal.dateTime, deviceTime, deps.now());
      await device.setRtcCalibration(ppm);
      deps.print(`Drift ${ppm.toFixed(3)} ppm, calibration set to ${clampPpm(ppm).toFixed(3)} ppm`);
    }));

  program.command('standby')
    .description('show the standby schedule')
    .action(() => withDevice(async (device) => {
      const { days } = await device.getStandby();
      days.forEach((w, i) => {
        const off = w.startHour === w.endHour && w.startMinute === w.endMinute;
        deps.print(off
          ? `${WEEKDAY_NAMES[i]} off`
          : `${WEEKDAY_NAMES[i]} ${pad2(w.startHour)}:${pad2(w.startMinute)}-${pad2(w.endHour)}:${pad2(w.endMinute)}`);
      });
    }));

  program.command('read-page <page>')
    .description('dump a flash configuration page')
    .action((text: string) => withDevice(async (device) => {
      const page = await device.getFlashConfigPage(parseInteger(text, 'page', 0xffff));
      deps.print(`page ${page.pageNumber}: ${hex(page.data)}`);
    }));

  program.command('erase-sector <page>')
    .description('erase the flash sector starting at a page')
    .action((text: string) => withDevice(async (device) => {
      const startPage = parseInteger(text, 'page', 0xffff);
      await device.eraseFlashConfigSector(startPage);
      deps.print(`Erased sector at page ${startPage}`);
    }));

  program.command('write-page <page> <hex>')
    .description(`write clock configuration to a page (up to ${Sizes.FLASH_PAGE_DATA} bytes, rest filled with ff)`)
    .action((pageText: string, dataText: string) => withDevice(async (device) => {
      const bytes = parseHex(dataText);
      if (bytes.length > Sizes.FLASH_PAGE_DATA) {
        throw new RangeError(`Page data is ${bytes.length} bytes, at most ${Sizes.FLASH_PAGE_DATA} fit`);
      }
      const data = Buffer.alloc(Sizes.FLASH_PAGE_DATA, 0xff);
      bytes.copy(data);
      const config = { pageNumber: parseInteger(pageText, 'page', 0xffff), data };
      await device.setFlashClockConfig(config);
      deps.print(`Wrote page ${config.pageNumber}`);
    }));

  program.command('appointments')
    .description('list appointments')
    .action(() => withDevice(async (device) => {
      const list = await device.getAppointments();
      list.forEach((a, i) => {
        if (AppointmentsRecord.isEmpty(a)) return;
        deps.print(`#${i + 1} ${pad2(a.month)}-${pad2(a.day)} ${pad2(a.hour)}:${pad2(a.minute)}`);
      });
    }));

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
