import dedent from 'dedent';
import * as t from 'ts-codec';

/**
 * The meta tags here are used in the generated JSON schema.
 * The JSON schema can be used to help operators edit the YAML config file.
 */

/**
 * Users might specify ports as strings if using YAML custom tag environment substitutions
 */
export const portCodec = t
  .codec<number, number | string>(
    'Port',
    (value) => value,
    (value) => (typeof value == 'number' ? value : parseInt(value))
  )
  .meta({
    description:
      'A network port value that can be specified as either a number or a string that will be parsed to a number.'
  });

/**
 * This gets used whenever generating a JSON schema
 */
export const portParser = {
  tag: portCodec._tag,
  parse: () => ({
    anyOf: [{ type: 'number' }, { type: 'string' }]
  })
};

/**
 * Durations and counts can be substituted from the environment as strings too.
 */
export const numberCodec = t.codec<number, number | string>(
  'FlexibleNumber',
  (value) => value,
  (value) => (typeof value == 'number' ? value : Number(value))
);

export const numberParser = {
  tag: numberCodec._tag,
  parse: () => ({
    anyOf: [{ type: 'number' }, { type: 'string', pattern: '^[0-9]+$' }]
  })
};

export const BaseStorageConfig = t
  .object({
    type: t.string.meta({
      description: 'The type of coordination store to use ("memory" or "mongodb").'
    }),
    max_pool_size: t.number
      .meta({
        description: 'Maximum number of connections to the storage database, per process. Defaults to 8.'
      })
      .optional()
  })
  .meta({
    description: 'Base configuration for the coordination store.'
  });

export type BaseStorageConfig = t.Encoded<typeof BaseStorageConfig>;

/**
 * This essentially allows any extra fields on this type. The storage module decodes its own fields.
 */
export const GenericStorageConfig = BaseStorageConfig.and(t.record(t.any));
export type GenericStorageConfig = t.Encoded<typeof GenericStorageConfig>;

export const SourceTableConfig = t
  .object({
    table_id: t.number.meta({ description: 'Numeric id of the table in the upstream cluster.' }),
    schema: t.string,
    name: t.string,
    eligible: t.boolean
      .meta({
        description: 'False for tables that cannot be replicated, for example tables without a primary or unique key.'
      })
      .optional()
  })
  .meta({
    description: 'A table of the upstream source.'
  });

export type SourceTableConfig = t.Encoded<typeof SourceTableConfig>;

export const CaptureConfig = t
  .object({
    heartbeat_interval_ms: numberCodec
      .meta({ description: 'How often a capture refreshes its liveness deadline. Default of 1000.' })
      .optional(),
    capture_ttl_ms: numberCodec
      .meta({
        description: dedent`
          Time after the last heartbeat before a capture is considered dead and its tables are
          rescheduled. Default of 10000.
        `
      })
      .optional(),
    owner_lease_ttl_ms: numberCodec.meta({ description: 'Time-to-live of the owner lease. Default of 10000.' }).optional(),
    owner_tick_interval_ms: numberCodec
      .meta({ description: 'Interval of the owner scheduling loop. Default of 500.' })
      .optional(),
    processor_tick_interval_ms: numberCodec
      .meta({ description: 'Interval of the processor loop on every capture. Default of 500.' })
      .optional(),
    removed_gc_grace_ms: numberCodec
      .meta({
        description: dedent`
          Time a removed changefeed stays visible (in state "removed") after all its tables have
          been released. Default of 0.
        `
      })
      .optional()
  })
  .meta({
    description: 'Timing of the capture, owner and processor loops.'
  });

export const controlPlaneConfig = t
  .object({
    port: portCodec.meta({ description: 'Port the HTTP API listens on. Default of 8300.' }).optional(),
    advertise_address: t.string
      .meta({ description: 'Address other captures and operators reach this capture on.' })
      .optional(),
    log_level: t.string
      .meta({ description: 'Initial log level (error, warn, info, debug). Can be changed at runtime.' })
      .optional(),

    storage: GenericStorageConfig.meta({
      description: 'The coordination store shared by all captures. Defaults to an in-process store.'
    }).optional(),

    capture: CaptureConfig.optional(),

    source: t
      .object({
        tables: t.array(SourceTableConfig).optional()
      })
      .meta({
        description: 'Static description of the upstream source.'
      })
      .optional(),

    api_parameters: t
      .object({
        max_concurrent_requests: numberCodec
          .meta({ description: 'Requests handled concurrently per process. Default of 10.' })
          .optional(),
        max_queue_depth: numberCodec
          .meta({
            description: dedent`
              Requests waiting for a slot before new ones are rejected with 429.
              Default of 20.
            `
          })
          .optional()
      })
      .optional(),

    healthcheck: t
      .object({
        probes: t
          .object({
            use_http: t.boolean
              .meta({ description: 'Expose the probe state over HTTP on /probes/*. Default true.' })
              .optional()
          })
          .optional()
      })
      .optional()
  })
  .meta({
    description: 'Control plane configuration file.'
  });

export type ControlPlaneConfig = t.Decoded<typeof controlPlaneConfig>;
export type SerializedControlPlaneConfig = t.Encoded<typeof controlPlaneConfig>;

export const ControlPlaneConfigJSONSchema = t.generateJSONSchema(controlPlaneConfig, {
  allowAdditional: true,
  parsers: [portParser, numberParser]
});
