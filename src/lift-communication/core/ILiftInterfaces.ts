import type { EncodedCommand, ITelemetryFrame, LiftCommand } from '../shared/DomainModels';

/** Serialization contract between the control loop and the wire schema. */
export interface ILiftCodec {
  encodeCommand(command: LiftCommand, pulsesPerMeter: number): Uint8Array;
  decodeCommand(buffer: Uint8Array): EncodedCommand;
  encodeTelemetry(frame: ITelemetryFrame): Uint8Array;
  decodeTelemetry(buffer: Uint8Array): ITelemetryFrame;
}
