import { z } from 'zod';

export const RawValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
]);

export type RawValue = z.infer<typeof RawValueSchema>;

export const RawSnapshotPointSchema = z
  .object({
    name: z.string().min(1),
    value: RawValueSchema.optional().default(null),
  })
  .passthrough();

export const RawSnapshotDeviceSchema = z
  .object({
    device_type: z.string().optional(),
    timestamp: z.string().optional(),
    points: z.array(RawSnapshotPointSchema).optional(),
  })
  .passthrough();

/**
 * Datalogger `/livedata` payload: device id to reported points.
 *
 * Used for the capture files read by the mapping build and for snapshots
 * handed to the normalizer.
 */
export const RawSnapshotSchema = z.record(RawSnapshotDeviceSchema);

export type RawSnapshotPoint = z.infer<typeof RawSnapshotPointSchema>;
export type RawSnapshotDevice = z.infer<typeof RawSnapshotDeviceSchema>;
export type RawSnapshot = z.infer<typeof RawSnapshotSchema>;
