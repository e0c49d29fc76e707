// Domain models for the lift client.
// Frames carry wire units (pulses, pulses/s); records handed to callers carry metres.

export enum RobotType {
  UNKNOWN = 0,
  LOTA_LINEAR_LIFT = 1,
}

export enum LiftState {
  BRAKE = 0,
  CALIBRATING = 1,
  ALGORITHM_CONTROL = 2,
  OVERTAKE_CONTROL = 3,
  EMERGENCY_STOP = 4,
}

export enum ParkingStopCategory {
  NONE = 0,
  EMERGENCY_STOP_BUTTON = 1,
  MOTOR_HAS_ERROR = 2,
  OVER_CURRENT = 3,
  COMMUNICATION_LOST = 4,
}

export interface IParkingStopDetail {
  category: ParkingStopCategory;
  isRemotelyClearable?: boolean;
  errorCode?: number;
}

export interface IMotorStatusFrame {
  position: number;
  speed: number;
  torque?: number;
  driverTemperature?: number;
  motorTemperature?: number;
  voltage?: number;
  errorCodes: number[];
}

export interface ILiftStatusFrame {
  state: LiftState;
  calibrated: boolean;
  maxPos: number;
  currentPos: number;
  /** current speed setting */
  speed: number;
  /** upper bound accepted for the speed setting */
  maxSpeed: number;
  pulsePerMeter: number;
  customButtonPressed?: boolean;
  parkingStopDetail?: IParkingStopDetail;
  motorStatus?: IMotorStatusFrame;
}

export interface ITelemetryFrame {
  robotType: RobotType;
  /** lift-side frame counter, when the controller reports one */
  sequence?: number;
  liftStatus: ILiftStatusFrame;
}

export interface ITelemetrySnapshot {
  /** control cycle in which the frame was applied; strictly increasing */
  readonly sequence: number;
  readonly receivedAt: number;
  readonly frame: ITelemetryFrame;
}

export type LiftCommand =
  | { readonly kind: 'targetPos'; readonly position: number }
  | { readonly kind: 'maxSpeed'; readonly speed: number }
  | { readonly kind: 'brake' }
  | { readonly kind: 'calibrate' };

export type LiftCommandKind = LiftCommand['kind'];

/** A decoded APIDown message, in wire units. */
export type EncodedCommand =
  | { kind: 'targetPos'; targetPos: number }
  | { kind: 'maxSpeed'; setSpeed: number }
  | { kind: 'brake' }
  | { kind: 'calibrate' }
  | { kind: 'none' };

export interface ILiftStatusRecord {
  state: LiftState;
  calibrated: boolean;
  /** metres */
  currentPos: number;
  /** metres; the valid range is [0, maxPos] or [maxPos, 0] */
  maxPos: number;
  /** pulses/s */
  currentMaxSpeed: number;
  /** pulses/s */
  speedLimit: number;
  customButtonPressed: boolean;
  parkingStop: IParkingStopDetail | null;
  sequence: number;
  receivedAt: number;
}

export interface IMotorDataRecord {
  /** metres */
  position: number;
  /** metres/s */
  speed: number;
  torque: number | null;
  driverTemperature: number | null;
  motorTemperature: number | null;
  voltage: number | null;
  errorCodes: number[];
  sequence: number;
  receivedAt: number;
}

export interface IPositionRange {
  min: number;
  max: number;
}

export interface ITimingOverrun {
  cycle: number;
  durationMs: number;
  periodMs: number;
}

export interface IControlLoopStats {
  cycles: number;
  overruns: number;
  commandsSent: number;
  decodeFailures: number;
  droppedFrames: number;
}
