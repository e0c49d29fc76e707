import * as path from 'path';
import * as protobuf from 'protobufjs';
import { z } from 'zod';

import { LiftState, ParkingStopCategory, RobotType } from '../shared/DomainModels';
import type { EncodedCommand, ITelemetryFrame, LiftCommand } from '../shared/DomainModels';
import { metersToPulses } from '../../utils/units';
import { DecodingError, EncodingError, describeError } from './Errors';
import type { ILiftCodec } from './ILiftInterfaces';

export const PROTOCOL_MAJOR_VERSION = 1;

export const PROTO_PATH = path.resolve(__dirname, '../../../proto/hex_lift.proto');

const SINT32_MIN = -0x80000000;
const SINT32_MAX = 0x7fffffff;
const UINT32_MAX = 0xffffffff;

interface ILiftSchema {
  apiUp: protobuf.Type;
  apiDown: protobuf.Type;
}

// Loaded once per process, on first use
let schemaInstance: ILiftSchema | null = null;
const getSchema = (): ILiftSchema => {
  if (!schemaInstance) {
    const root = protobuf.loadSync(PROTO_PATH);
    schemaInstance = {
      apiUp: root.lookupType('hexlift.v1.APIUp'),
      apiDown: root.lookupType('hexlift.v1.APIDown'),
    };
  }
  return schemaInstance;
};

const TO_OBJECT_OPTIONS: protobuf.IConversionOptions = {
  enums: Number,
  longs: Number,
  defaults: false,
  oneofs: true,
};

const ParkingStopDetailSchema = z.object({
  category: z.nativeEnum(ParkingStopCategory),
  isRemotelyClearable: z.boolean().optional(),
  errorCode: z.number().int().optional(),
});

const MotorStatusSchema = z.object({
  position: z.number().int(),
  speed: z.number().int(),
  torque: z.number().optional(),
  driverTemperature: z.number().optional(),
  motorTemperature: z.number().optional(),
  voltage: z.number().optional(),
  errorCodes: z.array(z.number().int()).default([]),
});

const LinearLiftStatusSchema = z.object({
  state: z.nativeEnum(LiftState),
  calibrated: z.boolean(),
  maxPos: z.number().int(),
  currentPos: z.number().int(),
  speed: z.number().int(),
  maxSpeed: z.number().int(),
  pulsePerMeter: z.number().int().positive(),
  customButtonPressed: z.boolean().optional(),
  parkingStopDetail: ParkingStopDetailSchema.optional(),
  motorStatus: MotorStatusSchema.optional(),
});

const ApiUpSchema = z.object({
  protocolMajorVersion: z.number().int(),
  robotType: z.nativeEnum(RobotType),
  sequence: z.number().int().optional(),
  linearLiftStatus: LinearLiftStatusSchema.optional(),
});

const LinearLiftCommandSchema = z.object({
  command: z.enum(['targetPos', 'calibrate', 'brake', 'setSpeed']).optional(),
  targetPos: z.number().int().optional(),
  setSpeed: z.number().int().optional(),
});

const ApiDownSchema = z.object({
  protocolMajorVersion: z.number().int(),
  linearLiftCommand: LinearLiftCommandSchema.optional(),
});

const requireInteger = (value: number, min: number, max: number, field: string): number => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new EncodingError(`${field} must be an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
};

const toLinearLiftCommand = (command: LiftCommand, pulsesPerMeter: number): Record<string, number | boolean> => {
  switch (command.kind) {
    case 'targetPos': {
      if (!Number.isFinite(pulsesPerMeter) || pulsesPerMeter <= 0) {
        throw new EncodingError(`pulsesPerMeter must be positive, got ${pulsesPerMeter}`);
      }
      if (!Number.isFinite(command.position)) {
        throw new EncodingError(`target position must be finite, got ${command.position}`);
      }
      return { targetPos: requireInteger(metersToPulses(command.position, pulsesPerMeter), SINT32_MIN, SINT32_MAX, 'target_pos') };
    }
    case 'maxSpeed':
      return { setSpeed: requireInteger(command.speed, 0, UINT32_MAX, 'set_speed') };
    case 'brake':
      return { brake: true };
    case 'calibrate':
      return { calibrate: true };
  }
};

const encodeMessage = (type: protobuf.Type, payload: Record<string, unknown>): Uint8Array => {
  const invalid = type.verify(payload);
  if (invalid) {
    throw new EncodingError(`${type.name} rejected by schema: ${invalid}`);
  }
  return type.encode(type.fromObject(payload)).finish();
};

const decodeMessage = (type: protobuf.Type, buffer: Uint8Array): unknown => {
  if (buffer.length === 0) {
    throw new DecodingError(`${type.name}: empty frame`);
  }
  try {
    return type.toObject(type.decode(buffer), TO_OBJECT_OPTIONS);
  } catch (error) {
    throw new DecodingError(`${type.name}: malformed frame (${describeError(error)})`, { cause: error });
  }
};

const checkProtocolVersion = (version: number): void => {
  if (version !== PROTOCOL_MAJOR_VERSION) {
    throw new DecodingError(`protocol major version mismatch: expected ${PROTOCOL_MAJOR_VERSION}, got ${version}`);
  }
};

export class LiftCodec implements ILiftCodec {
  public encodeCommand(command: LiftCommand, pulsesPerMeter: number): Uint8Array {
    return encodeMessage(getSchema().apiDown, {
      protocolMajorVersion: PROTOCOL_MAJOR_VERSION,
      linearLiftCommand: toLinearLiftCommand(command, pulsesPerMeter),
    });
  }

  public decodeCommand(buffer: Uint8Array): EncodedCommand {
    const parsed = ApiDownSchema.safeParse(decodeMessage(getSchema().apiDown, buffer));
    if (!parsed.success) {
      throw new DecodingError(`APIDown: unexpected content (${parsed.error.message})`);
    }
    checkProtocolVersion(parsed.data.protocolMajorVersion);

    const liftCommand = parsed.data.linearLiftCommand;
    if (!liftCommand) {
      return { kind: 'none' };
    }
    switch (liftCommand.command) {
      case 'targetPos':
        return { kind: 'targetPos', targetPos: liftCommand.targetPos ?? 0 };
      case 'setSpeed':
        return { kind: 'maxSpeed', setSpeed: liftCommand.setSpeed ?? 0 };
      case 'brake':
        return { kind: 'brake' };
      case 'calibrate':
        return { kind: 'calibrate' };
      default:
        return { kind: 'none' };
    }
  }

  public encodeTelemetry(frame: ITelemetryFrame): Uint8Array {
    return encodeMessage(getSchema().apiUp, {
      protocolMajorVersion: PROTOCOL_MAJOR_VERSION,
      robotType: frame.robotType,
      sequence: frame.sequence,
      linearLiftStatus: frame.liftStatus,
    });
  }

  public decodeTelemetry(buffer: Uint8Array): ITelemetryFrame {
    const parsed = ApiUpSchema.safeParse(decodeMessage(getSchema().apiUp, buffer));
    if (!parsed.success) {
      throw new DecodingError(`APIUp: unexpected content (${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')})`);
    }
    const { protocolMajorVersion, robotType, sequence, linearLiftStatus } = parsed.data;
    checkProtocolVersion(protocolMajorVersion);
    if (robotType !== RobotType.LOTA_LINEAR_LIFT) {
      throw new DecodingError(`unsupported robot type: ${RobotType[robotType]}`);
    }
    if (!linearLiftStatus) {
      throw new DecodingError('APIUp: linear_lift_status is missing');
    }
    return sequence === undefined
      ? { robotType, liftStatus: linearLiftStatus }
      : { robotType, sequence, liftStatus: linearLiftStatus };
  }
}
