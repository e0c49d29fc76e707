import { ControlLoop, type ControlLoopState } from './core/ControlLoop';
import { ValidationError, type EncodingError } from './core/Errors';
import type { ILiftCodec } from './core/ILiftInterfaces';
import { LiftCodec } from './core/LiftMessages';
import { consoleLogger, type ILogger } from './core/Logger';
import { Session, type SessionState } from './core/Session';
import { Transport, type ITransport } from './core/Transport';
import { ParkingStopCategory } from './shared/DomainModels';
import type {
  IControlLoopStats,
  ILiftStatusRecord,
  IMotorDataRecord,
  IPositionRange,
  ITelemetrySnapshot,
  ITimingOverrun,
  LiftCommand,
} from './shared/DomainModels';
import { clampControlHz, resolveLiftApiConfig, type LiftApiConfig, type LiftApiOptions } from './shared/LiftApiTypes';
import { convert, pulsesToMeters } from '../utils/units';

export interface ILiftApiDependencies {
  transport?: ITransport;
  codec?: ILiftCodec;
  logger?: ILogger;
}

const toStatusRecord = (snapshot: ITelemetrySnapshot): ILiftStatusRecord => {
  const status = snapshot.frame.liftStatus;
  const parkingStop = status.parkingStopDetail;
  return {
    state: status.state,
    calibrated: status.calibrated,
    currentPos: pulsesToMeters(status.currentPos, status.pulsePerMeter),
    maxPos: pulsesToMeters(status.maxPos, status.pulsePerMeter),
    currentMaxSpeed: status.speed,
    speedLimit: status.maxSpeed,
    customButtonPressed: status.customButtonPressed ?? false,
    parkingStop: parkingStop && parkingStop.category !== ParkingStopCategory.NONE ? { ...parkingStop } : null,
    sequence: snapshot.sequence,
    receivedAt: snapshot.receivedAt,
  };
};

const toMotorDataRecord = (snapshot: ITelemetrySnapshot): IMotorDataRecord | null => {
  const { motorStatus, pulsePerMeter } = snapshot.frame.liftStatus;
  if (!motorStatus) {
    return null;
  }
  return {
    position: pulsesToMeters(motorStatus.position, pulsePerMeter),
    speed: convert(motorStatus.speed, 'pulse', 'm', pulsePerMeter),
    torque: motorStatus.torque ?? null,
    driverTemperature: motorStatus.driverTemperature ?? null,
    motorTemperature: motorStatus.motorTemperature ?? null,
    voltage: motorStatus.voltage ?? null,
    errorCodes: [...motorStatus.errorCodes],
    sequence: snapshot.sequence,
    receivedAt: snapshot.receivedAt,
  };
};

/**
 * Entry point for controlling one hex lift.
 *
 * Setters validate and queue a command for the control loop; getters return copies of
 * the latest telemetry and never block.
 *
 * @example
 * ```typescript
 * const lift = new LiftApi({ url: 'ws://192.168.1.20:8439', controlHz: 100 });
 * lift.onFatalError = (error) => console.error('lift offline', error);
 * await lift.start();
 * lift.initLift();
 * lift.setTargetPos(0.3);
 * console.log(lift.getStatus()?.currentPos);
 * await lift.stop();
 * ```
 */
export class LiftApi {
  /** Settings as resolved at construction; `controlHz` reports the rate in effect. */
  public readonly config: LiftApiConfig;
  private readonly logger: ILogger;
  private readonly session: Session;
  private readonly loop: ControlLoop;
  private lastReadSequence: number | null = null;

  public onTelemetry: ((snapshot: ITelemetrySnapshot) => void) | null = null;
  public onFatalError: ((error: Error) => void) | null = null;
  public onTimingOverrun: ((overrun: ITimingOverrun) => void) | null = null;
  public onCommandRejected: ((command: LiftCommand, error: EncodingError) => void) | null = null;
  public onSessionStateChanged: ((state: SessionState, previous: SessionState) => void) | null = null;

  constructor(options: LiftApiOptions, dependencies: ILiftApiDependencies = {}) {
    this.logger = dependencies.logger ?? consoleLogger;
    this.config = resolveLiftApiConfig(options, this.logger);

    const transport =
      dependencies.transport ??
      new Transport(
        {
          handshakeTimeoutMs: this.config.connectTimeoutMs,
          closeTimeoutMs: this.config.closeTimeoutMs,
          pingIntervalMs: this.config.pingIntervalMs,
          pingTimeoutMs: this.config.pingTimeoutMs,
        },
        this.logger,
      );
    this.session = new Session(transport, this.config, this.logger);
    this.loop = new ControlLoop(this.session, dependencies.codec ?? new LiftCodec(), this.config, this.logger);

    this.session.onStateChanged = (state, previous) => this.onSessionStateChanged?.(state, previous);
    this.loop.onTelemetry = (snapshot) => this.onTelemetry?.(snapshot);
    this.loop.onFatalError = (error) => this.onFatalError?.(error);
    this.loop.onTimingOverrun = (overrun) => this.onTimingOverrun?.(overrun);
    this.loop.onCommandRejected = (command, error) => this.onCommandRejected?.(command, error);
  }

  public get controlHz(): number {
    return 1000 / this.loop.period;
  }

  public get sessionState(): SessionState {
    return this.session.state;
  }

  public get loopState(): ControlLoopState {
    return this.loop.state;
  }

  /** Set once the connection is lost for good; cleared by the next successful `start()`. */
  public get fatalError(): Error | null {
    return this.loop.fatalError;
  }

  public get stats(): IControlLoopStats {
    return this.loop.stats;
  }

  /** Connects and starts the control loop. Rejects with `ConnectionError` if the lift cannot be reached. */
  public start(): Promise<void> {
    return this.loop.start();
  }

  /** Stops the loop and closes the connection; resolves once both are done. */
  public stop(): Promise<void> {
    return this.loop.stop();
  }

  public setControlHz(controlHz: number): void {
    this.loop.setControlHz(clampControlHz(controlHz, this.logger));
  }

  ////////// Command setters //////////

  /**
   * Queues a move to `position` metres, replacing any command not sent yet.
   * The range is `config.positionRange` when given, otherwise [0, maxPos] or [maxPos, 0] as reported by the lift.
   */
  public setTargetPos(position: number): void {
    if (!Number.isFinite(position)) {
      throw new ValidationError(`setTargetPos: position must be a finite number, got ${position}`);
    }
    const range = this.getPositionRange();
    if (!range) {
      throw new ValidationError('setTargetPos: position range is unknown until the lift reports its status');
    }
    if (position < range.min || position > range.max) {
      throw new ValidationError(`setTargetPos: target ${position} m is outside [${range.min}, ${range.max}] m`);
    }
    this.loop.submitCommand({ kind: 'targetPos', position });
  }

  /** Speed limit in pulses/s; values above the lift's own limit are clamped to it. */
  public setMaxSpeed(speed: number): void {
    if (!Number.isInteger(speed) || speed < 0) {
      throw new ValidationError(`setMaxSpeed: speed must be a non-negative integer, got ${speed}`);
    }
    const limit = this.loop.snapshot?.frame.liftStatus.maxSpeed;
    if (limit !== undefined && speed > limit) {
      this.logger.warn(`LiftApi: max speed ${speed} clamped to the lift limit ${limit}`);
      this.loop.submitCommand({ kind: 'maxSpeed', speed: limit });
      return;
    }
    this.loop.submitCommand({ kind: 'maxSpeed', speed });
  }

  /** Brakes the motor at once. A later target position or calibration releases it. */
  public setBrake(): void {
    this.loop.submitCommand({ kind: 'brake' });
  }

  /** Starts motor calibration. */
  public initLift(): void {
    this.loop.submitCommand({ kind: 'calibrate' });
  }

  public getPendingCommand(): LiftCommand | null {
    return this.loop.pendingCommand;
  }

  ////////// Data getters //////////

  public getSnapshot(): ITelemetrySnapshot | null {
    return this.loop.snapshot;
  }

  public getStatus(): ILiftStatusRecord | null {
    const snapshot = this.loop.snapshot;
    if (!snapshot) {
      return null;
    }
    this.lastReadSequence = snapshot.sequence;
    return toStatusRecord(snapshot);
  }

  public getMotorData(): IMotorDataRecord | null {
    const snapshot = this.loop.snapshot;
    if (!snapshot) {
      return null;
    }
    this.lastReadSequence = snapshot.sequence;
    return toMotorDataRecord(snapshot);
  }

  /** True when a snapshot arrived that neither `getStatus()` nor `getMotorData()` has returned yet. */
  public hasNewData(): boolean {
    const snapshot = this.loop.snapshot;
    return snapshot !== null && snapshot.sequence !== this.lastReadSequence;
  }

  public getPositionRange(): IPositionRange | null {
    if (this.config.positionRange) {
      return { ...this.config.positionRange };
    }
    const snapshot = this.loop.snapshot;
    if (!snapshot) {
      return null;
    }
    const { maxPos, pulsePerMeter } = snapshot.frame.liftStatus;
    const maxPosMetres = pulsesToMeters(maxPos, pulsePerMeter);
    return maxPosMetres < 0 ? { min: maxPosMetres, max: 0 } : { min: 0, max: maxPosMetres };
  }
}
