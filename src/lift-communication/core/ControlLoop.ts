import { ParkingStopCategory } from '../shared/DomainModels';
import type {
  IControlLoopStats,
  ITelemetryFrame,
  ITelemetrySnapshot,
  ITimingOverrun,
  LiftCommand,
} from '../shared/DomainModels';
import { StateSlot, deepFreeze } from '../shared/StateSlot';
import { DecodingError, EncodingError, InvalidStateError, TransportError, ValidationError, describeError } from './Errors';
import type { ILiftCodec } from './ILiftInterfaces';
import { ThrottledLog, consoleLogger, type ILogger } from './Logger';
import { SessionState, type ISession } from './Session';

export enum ControlLoopState {
  RUNNING = 'RUNNING',
  STOPPED = 'STOPPED',
  STOPPING = 'STOPPING',
}

export interface IControlLoopConfig {
  controlHz: number;
  /** telemetry older than this holds outgoing commands */
  telemetryTimeoutMs: number;
}

interface IWakeUp {
  resolve: () => void;
  timer: NodeJS.Timeout;
}

const WARNING_INTERVAL_MS = 1000;

const periodFor = (controlHz: number): number => {
  if (!Number.isFinite(controlHz) || controlHz <= 0) {
    throw new ValidationError(`controlHz must be a positive number, got ${controlHz}`);
  }
  return 1000 / controlHz;
};

/**
 * Periodic task keeping the lift and this process in sync.
 *
 * Every cycle sends the pending command (if the lift can take it), then applies the
 * newest decodable telemetry frame as the current snapshot. Cycles are paced on
 * `1000 / controlHz` ms; a late cycle is reported and the schedule resynchronised
 * instead of bursting to catch up.
 */
export class ControlLoop {
  private loopState = ControlLoopState.STOPPED;
  private periodMs: number;
  private readonly commandSlot = new StateSlot<LiftCommand>();
  private readonly snapshotSlot = new StateSlot<ITelemetrySnapshot>();
  private cycle = 0;
  private overruns = 0;
  private commandsSent = 0;
  private decodeFailures = 0;
  private failure: Error | null = null;
  private recovering = false;
  private startPromise: Promise<void> | null = null;
  private runPromise: Promise<void> | null = null;
  private wakeUp: IWakeUp | null = null;
  private readonly staleWarning = new ThrottledLog(WARNING_INTERVAL_MS);
  private readonly calibrationWarning = new ThrottledLog(WARNING_INTERVAL_MS);
  private readonly parkingStopWarning = new ThrottledLog(WARNING_INTERVAL_MS);
  private readonly overrunWarning = new ThrottledLog(WARNING_INTERVAL_MS);

  public onTelemetry: ((snapshot: ITelemetrySnapshot) => void) | null = null;
  public onFatalError: ((error: Error) => void) | null = null;
  public onTimingOverrun: ((overrun: ITimingOverrun) => void) | null = null;
  public onCommandRejected: ((command: LiftCommand, error: EncodingError) => void) | null = null;

  constructor(
    private readonly session: ISession,
    private readonly codec: ILiftCodec,
    private readonly config: IControlLoopConfig,
    private readonly logger: ILogger = consoleLogger,
    private readonly now: () => number = () => Date.now(),
  ) {
    this.periodMs = periodFor(config.controlHz);
  }

  public get state(): ControlLoopState {
    return this.loopState;
  }

  public get period(): number {
    return this.periodMs;
  }

  public get snapshot(): ITelemetrySnapshot | null {
    return this.snapshotSlot.read();
  }

  public get pendingCommand(): LiftCommand | null {
    return this.commandSlot.read();
  }

  public get fatalError(): Error | null {
    return this.failure;
  }

  public get stats(): IControlLoopStats {
    return {
      cycles: this.cycle,
      overruns: this.overruns,
      commandsSent: this.commandsSent,
      decodeFailures: this.decodeFailures,
      droppedFrames: this.session.droppedFrames,
    };
  }

  public setControlHz(controlHz: number): void {
    if (this.loopState !== ControlLoopState.STOPPED) {
      throw new InvalidStateError(`Control frequency can only change while STOPPED (loop is ${this.loopState})`);
    }
    this.periodMs = periodFor(controlHz);
  }

  /** Replaces whatever command is still waiting to be sent. */
  public submitCommand(command: LiftCommand): void {
    this.commandSlot.replace(command);
  }

  public start(): Promise<void> {
    if (this.loopState === ControlLoopState.RUNNING) {
      return Promise.resolve();
    }
    if (this.loopState === ControlLoopState.STOPPING) {
      return Promise.reject(new InvalidStateError('Control loop is stopping'));
    }
    if (!this.startPromise) {
      this.startPromise = this.connectAndRun().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  /** Resolves once the loop has exited and the session is closed. Safe to call in any state. */
  public async stop(): Promise<void> {
    if (this.loopState === ControlLoopState.RUNNING) {
      this.logger.info('ControlLoop: stopping');
      this.loopState = ControlLoopState.STOPPING;
      this.wake();
    }
    if (this.recovering || !this.runPromise) {
      await this.session.close();
    }
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  private async connectAndRun(): Promise<void> {
    await this.session.connect();
    this.failure = null;
    this.snapshotSlot.clear();
    this.staleWarning.reset();
    this.calibrationWarning.reset();
    this.parkingStopWarning.reset();
    this.loopState = ControlLoopState.RUNNING;
    this.logger.info(`ControlLoop: running at ${1000 / this.periodMs} Hz`);
    this.runPromise = this.run();
  }

  private async run(): Promise<void> {
    let nextCycleAt = this.now();
    try {
      while (this.loopState === ControlLoopState.RUNNING) {
        await this.runCycle();
        if (this.loopState !== ControlLoopState.RUNNING) {
          break;
        }
        nextCycleAt += this.periodMs;
        const now = this.now();
        if (nextCycleAt < now) {
          nextCycleAt = now;
        }
        await this.sleepUntil(nextCycleAt);
      }
    } catch (error) {
      this.fail(error);
    } finally {
      await this.session.close();
      this.loopState = ControlLoopState.STOPPED;
      this.runPromise = null;
      this.logger.info('ControlLoop: stopped');
    }
  }

  private async runCycle(): Promise<void> {
    const cycle = ++this.cycle;
    const startedAt = this.now();

    if (this.session.state === SessionState.DISCONNECTED) {
      this.logger.warn('ControlLoop: session lost, reconnecting');
      await this.recover();
      if (this.loopState !== ControlLoopState.RUNNING) {
        return;
      }
    }

    await this.dispatchPendingCommand(startedAt);
    if (this.loopState !== ControlLoopState.RUNNING) {
      return;
    }
    this.applyLatestTelemetry(cycle);
    this.checkLiftHealth(startedAt);
    this.checkTiming(cycle, startedAt);
  }

  private async dispatchPendingCommand(now: number): Promise<void> {
    const command = this.commandSlot.read();
    const snapshot = this.snapshotSlot.read();
    // Held until the lift reports in, is fresh, and (except for calibration) calibrated
    if (!command || !snapshot) {
      return;
    }
    const status = snapshot.frame.liftStatus;
    if (now - snapshot.receivedAt > this.config.telemetryTimeoutMs) {
      return;
    }
    if (command.kind !== 'calibrate' && !status.calibrated) {
      return;
    }

    let payload: Uint8Array;
    try {
      payload = this.codec.encodeCommand(command, status.pulsePerMeter);
    } catch (error) {
      if (!(error instanceof EncodingError)) {
        throw error;
      }
      const rejection = error;
      this.commandSlot.clearIf(command);
      this.logger.error(`ControlLoop: dropping ${command.kind} command: ${rejection.message}`);
      this.notify(() => this.onCommandRejected?.(command, rejection));
      return;
    }

    try {
      this.session.send(payload);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.logger.warn(`ControlLoop: sending ${command.kind} failed, keeping it pending: ${error.message}`);
      await this.recover();
      return;
    }
    this.commandSlot.clearIf(command);
    this.commandsSent++;
  }

  // Only the newest frame that decodes is applied; anything older is superseded.
  private applyLatestTelemetry(cycle: number): void {
    const frames: Uint8Array[] = [];
    for (let frame = this.session.receive(); frame !== null; frame = this.session.receive()) {
      frames.push(frame);
    }

    for (let index = frames.length - 1; index >= 0; index--) {
      let decoded: ITelemetryFrame;
      try {
        decoded = this.codec.decodeTelemetry(frames[index]);
      } catch (error) {
        if (!(error instanceof DecodingError)) {
          throw error;
        }
        this.decodeFailures++;
        this.logger.warn(`ControlLoop: dropping telemetry frame: ${error.message}`);
        continue;
      }
      this.publish(decoded, cycle);
      return;
    }
  }

  private publish(frame: ITelemetryFrame, cycle: number): void {
    const snapshot = deepFreeze<ITelemetrySnapshot>({ sequence: cycle, receivedAt: this.now(), frame });
    this.snapshotSlot.replace(snapshot);
    this.notify(() => this.onTelemetry?.(snapshot));
  }

  private checkLiftHealth(now: number): void {
    const snapshot = this.snapshotSlot.read();
    if (!snapshot) {
      return;
    }
    const status = snapshot.frame.liftStatus;
    const age = now - snapshot.receivedAt;
    if (age > this.config.telemetryTimeoutMs && this.staleWarning.shouldLog(now)) {
      this.logger.warn(`ControlLoop: no telemetry for ${age}ms, lift may be offline`);
    }
    const parkingStop = status.parkingStopDetail;
    if (parkingStop && parkingStop.category !== ParkingStopCategory.NONE && this.parkingStopWarning.shouldLog(now)) {
      this.logger.error(
        `ControlLoop: emergency stop (${ParkingStopCategory[parkingStop.category]}), recalibrate the lift to clear it`,
      );
    }
    if (!status.calibrated && this.calibrationWarning.shouldLog(now)) {
      this.logger.warn('ControlLoop: lift is not calibrated, calibrate it before sending motion commands');
    }
  }

  private checkTiming(cycle: number, startedAt: number): void {
    const finishedAt = this.now();
    const durationMs = finishedAt - startedAt;
    if (durationMs <= this.periodMs) {
      return;
    }
    this.overruns++;
    if (this.overrunWarning.shouldLog(finishedAt)) {
      this.logger.warn(`ControlLoop: cycle ${cycle} took ${durationMs}ms, period is ${this.periodMs}ms`);
    }
    const overrun: ITimingOverrun = { cycle, durationMs, periodMs: this.periodMs };
    this.notify(() => this.onTimingOverrun?.(overrun));
  }

  private async recover(): Promise<void> {
    this.recovering = true;
    try {
      await this.session.reconnect();
    } catch (error) {
      if (this.loopState === ControlLoopState.RUNNING) {
        this.fail(error);
      }
    } finally {
      this.recovering = false;
    }
  }

  // Reported once; the loop then winds down through STOPPING.
  private fail(error: unknown): void {
    if (this.failure) {
      return;
    }
    const fatal = error instanceof Error ? error : new Error(String(error));
    this.failure = fatal;
    this.loopState = ControlLoopState.STOPPING;
    this.logger.error(`ControlLoop: fatal error, stopping: ${fatal.message}`);
    this.notify(() => this.onFatalError?.(fatal));
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`ControlLoop: event handler threw: ${describeError(error)}`);
    }
  }

  private sleepUntil(deadline: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, Math.max(0, deadline - this.now()));
      this.wakeUp = { resolve, timer };
    });
  }

  private wake(): void {
    const wakeUp = this.wakeUp;
    if (wakeUp) {
      this.wakeUp = null;
      clearTimeout(wakeUp.timer);
      wakeUp.resolve();
    }
  }
}
