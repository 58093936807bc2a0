/**
 * MF-JSON (OGC Moving Features JSON) document schema.
 *
 * Sample arrays are validated as `unknown[]` here and element by element
 * against the value schema of the requested domain.
 */

import { z } from "zod";
import type { Point, ValueKind } from "@tempora/contracts";

export const MOVING_TYPES = {
  bool: "MovingBoolean",
  int: "MovingInteger",
  float: "MovingFloat",
  text: "MovingText",
  point: "MovingPoint",
} as const satisfies Record<ValueKind, string>;

const CrsSchema = z.object({
  type: z.literal("Name"),
  properties: z.object({ name: z.string() }),
});

const PeriodSchema = z.object({
  begin: z.string(),
  end: z.string(),
  lower_inc: z.boolean(),
  upper_inc: z.boolean(),
});

export const SamplesSchema = z.object({
  values: z.array(z.unknown()).min(1).optional(),
  coordinates: z.array(z.unknown()).min(1).optional(),
  datetimes: z.array(z.string()).min(1),
  lower_inc: z.boolean().optional(),
  upper_inc: z.boolean().optional(),
});

export const DocumentSchema = SamplesSchema.partial({ datetimes: true }).extend({
  type: z.enum([
    MOVING_TYPES.bool,
    MOVING_TYPES.int,
    MOVING_TYPES.float,
    MOVING_TYPES.text,
    MOVING_TYPES.point,
  ]),
  interpolation: z.enum(["None", "Discrete", "Step", "Linear"]),
  crs: CrsSchema.optional(),
  bbox: z.array(z.number()).optional(),
  period: PeriodSchema.optional(),
  sequences: z.array(SamplesSchema).min(1).optional(),
});

export type Samples = z.infer<typeof SamplesSchema>;
export type MfJsonDocument = z.infer<typeof DocumentSchema>;

// ============================================================================
// Values
// ============================================================================

export const BoolValue = z.boolean();
export const IntValue = z.number().int();
export const FloatValue = z.number();
export const TextValue = z.string();
export const Coordinates = z
  .array(z.number())
  .min(2)
  .max(3)
  .transform(([x, y, z]): Point => (z === undefined ? { x, y } : { x, y, z }));

/** `EPSG:4326` or `urn:ogc:def:crs:EPSG::4326`. */
export function sridFromCrsName(name: string): number | null {
  const match = /^(?:EPSG:|urn:ogc:def:crs:EPSG::?)(\d+)$/i.exec(name.trim());
  return match ? Number(match[1]) : null;
}
