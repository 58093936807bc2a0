import type { Interpolation, ScalarKind } from "@tempora/contracts";

/** Version byte of the extended variant; the high bit marks it. */
export const EXTENDED_VERSION = 0x81;

export const TypeTag = {
  instant: 1,
  sequence: 2,
  sequenceSet: 3,
  span: 4,
  spanSet: 5,
} as const;

export const InterpolationTag: Record<Interpolation, number> = {
  discrete: 0,
  step: 1,
  linear: 2,
};

export const DomainTag = {
  bool: 1,
  int: 2,
  float: 3,
  text: 4,
  geompoint: 5,
  geogpoint: 6,
} as const;

export type DomainTagName = keyof typeof DomainTag;

export const ScalarTag: Record<ScalarKind, number> = {
  int: 1,
  float: 2,
  timestamp: 3,
  date: 4,
};

export const Flags = {
  lowerInclusive: 0x01,
  upperInclusive: 0x02,
  hasZ: 0x04,
} as const;

export function interpolationFromTag(tag: number): Interpolation | null {
  switch (tag) {
    case 0:
      return "discrete";
    case 1:
      return "step";
    case 2:
      return "linear";
    default:
      return null;
  }
}
