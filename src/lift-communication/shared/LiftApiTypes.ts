import { z } from 'zod';

import { isWebSocketUrl } from '../../interfaces/IWebsocketUrl';
import { ValidationError } from '../core/Errors';
import type { ILogger } from '../core/Logger';

export const MAX_CONTROL_HZ = 1000;

const positiveMs = z.number().int().positive();

export const PositionRangeSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .refine((range) => range.min < range.max, { message: 'positionRange.min must be below positionRange.max' });

export const LiftApiConfigSchema = z.object({
  url: z.string().refine(isWebSocketUrl, { message: 'expected a ws:// or wss:// URL with host and port' }),
  controlHz: z.number().finite().positive().default(100),
  connectTimeoutMs: positiveMs.default(5000),
  closeTimeoutMs: positiveMs.default(5000),
  maxReconnectAttempts: z.number().int().min(0).default(5),
  reconnectBaseDelayMs: z.number().int().min(0).default(1000),
  pingIntervalMs: positiveMs.default(20000),
  pingTimeoutMs: positiveMs.default(60000),
  telemetryTimeoutMs: positiveMs.default(1000),
  maxQueuedFrames: z.number().int().positive().default(30),
  positionRange: PositionRangeSchema.optional(),
});

/** What callers pass in: only `url` is mandatory. */
export type LiftApiOptions = z.input<typeof LiftApiConfigSchema>;

export type LiftApiConfig = Readonly<z.output<typeof LiftApiConfigSchema>>;

export const clampControlHz = (controlHz: number, logger: ILogger): number => {
  if (controlHz > MAX_CONTROL_HZ) {
    logger.warn(`LiftApi: controlHz ${controlHz} is limited to ${MAX_CONTROL_HZ}`);
    return MAX_CONTROL_HZ;
  }
  return controlHz;
};

export const resolveLiftApiConfig = (options: LiftApiOptions, logger: ILogger): LiftApiConfig => {
  const parsed = LiftApiConfigSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid lift API configuration: ${issues.join('; ')}`);
  }
  const config = parsed.data;
  return Object.freeze({
    ...config,
    controlHz: clampControlHz(config.controlHz, logger),
    positionRange: config.positionRange ? Object.freeze({ ...config.positionRange }) : undefined,
  });
};
