import { z } from 'zod';

const port = z.number().int().min(1).max(65535);

export const protocolSchema = z.enum(['mqtt', 'mqtts', 'ws', 'wss']);

export type EventData = null | boolean | number | string | EventData[] | { [key: string]: EventData };

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Any JSON value. */
export const eventDataSchema: z.ZodType<EventData> = z.lazy(() =>
  z.union([literalSchema, z.array(eventDataSchema), z.record(eventDataSchema)])
);

export const qosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const optionsSchema = z.object({
  name: z.string().min(1).default('service'),
  debug: z.boolean().default(false),
  http_host: z.string().default('0.0.0.0'),
  http_port: port.default(5000),
  mqtt_protocol: protocolSchema.default('mqtt'),
  mqtt_host: z.string().min(1).default('eventbus'),
  mqtt_port: port.optional(),
  mqtt_path: z.string().default('/eventbus'),
  mqtt_will: z
    .object({
      topic: z.string().min(1),
      message: eventDataSchema.optional(),
      qos: qosSchema.default(0),
      retain: z.boolean().default(false),
    })
    .optional(),
  reconnect_interval_ms: z.number().int().positive().default(1000),
  pending_wait_ms: z.number().int().positive().default(5000),
  interaction_timeout_ms: z.number().int().positive().default(5000),
});
