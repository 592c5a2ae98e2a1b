import { CommandChannel } from '../core/CommandChannel';
import { Appointment, DateTime, FlashClockConfig, FlashConfigPage, Id100Options, LastCalibration, Link, Operation, StandbyConfig, VersionInfo } from '../types';
import { dbg } from '../utils/debug';
import { Id100NotConnectedError } from '../utils/errors';
import { Id100Commands } from './Id100Commands';

/**
 * Host-side driver for an ID100 clock/display.
 *
 * @example
 * const clock = new Id100Control({ link: new UdpLink({ host: '192.168.4.1' }) });
 * await clock.connect();
 * const { major, minor, revision } = await clock.getVersion();
 * await clock.disconnect();
 */
export class Id100Control {
  private link: Link;
  private channel: CommandChannel;
  private connected = false;
  private connecting?: Promise<void>;

  constructor(options: Id100Options) {
    this.link = options.link;
    this.channel = new CommandChannel(this.link);
  }

  get isConnected(): boolean { return this.connected; }

  /**
   * Open the link. Calling it again while connected is a no-op.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      dbg('connect() called but already connected');
      return;
    }
    // Overlapping callers wait for the same link connect
    if (!this.connecting) {
      this.connecting = this.link.connect()
        .then(() => {
          this.connected = true;
          dbg('Connected');
        })
        .finally(() => {
          this.connecting = undefined;
        });
    }
    return this.connecting;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    try {
      await this.link.disconnect();
    } finally {
      this.connected = false;
      dbg('Disconnected');
    }
  }

  private async run<Req, Res>(op: Operation<Req, Res>, request: Req): Promise<Res> {
    if (!this.connected) throw new Id100NotConnectedError(op.name);
    return this.channel.execute(op, request);
  }

  /**
   * Read the firmware version
   */
  getVersion(): Promise<VersionInfo> {
    return this.run(Id100Commands.getVersion, undefined);
  }

  getDateTime(): Promise<DateTime> {
    return this.run(Id100Commands.getDateTime, undefined);
  }

  setDateTime(dateTime: DateTime): Promise<void> {
    return this.run(Id100Commands.setDateTime, dateTime);
  }

  /**
   * Leave preview mode and show the time again
   */
  setNormalMode(): Promise<void> {
    return this.run(Id100Commands.setNormalMode, undefined);
  }

  /**
   * Show the bitmap set with setPreviewMatrix() instead of the time
   */
  setPreviewMode(): Promise<void> {
    return this.run(Id100Commands.setPreviewMode, undefined);
  }

  factoryReset(): Promise<void> {
    return this.run(Id100Commands.factoryReset, undefined);
  }

  /**
   * Restart into the bootloader for a firmware update
   */
  activateBootloader(): Promise<void> {
    return this.run(Id100Commands.activateBootloader, undefined);
  }

  /**
   * @param matrix - bitmap built with MatrixBitmap
   */
  setPreviewMatrix(matrix: Buffer): Promise<void> {
    return this.run(Id100Commands.setPreviewMatrix, matrix);
  }

  getIntensity(): Promise<number> {
    return this.run(Id100Commands.getIntensity, undefined);
  }

  setIntensity(intensity: number): Promise<void> {
    return this.run(Id100Commands.setIntensity, intensity);
  }

  getLastCalibration(): Promise<LastCalibration> {
    return this.run(Id100Commands.getLastCalibration, undefined);
  }

  /**
   * Set the RTC correction. Values beyond ±189 PPM are saturated, not rejected.
   */
  setRtcCalibration(ppmDifference: number): Promise<void> {
    return this.run(Id100Commands.setRtcCalibration, ppmDifference);
  }

  getStandby(): Promise<StandbyConfig> {
    return this.run(Id100Commands.getStandby, undefined);
  }

  setStandby(standby: StandbyConfig): Promise<void> {
    return this.run(Id100Commands.setStandby, standby);
  }

  getFlashConfigPage(pageNumber: number): Promise<FlashConfigPage> {
    return this.run(Id100Commands.getFlashConfigPage, pageNumber);
  }

  eraseFlashConfigSector(startPage: number): Promise<void> {
    return this.run(Id100Commands.eraseFlashConfigSector, startPage);
  }

  setFlashClockConfig(config: FlashClockConfig): Promise<void> {
    return this.run(Id100Commands.setFlashClockConfig, config);
  }

  getAppointments(): Promise<Appointment[]> {
    return this.run(Id100Commands.getAppointments, undefined);
  }

  setAppointments(appointments: Appointment[]): Promise<void> {
    return this.run(Id100Commands.setAppointments, appointments);
  }
}
