/**
 * STBox
 *
 * Spatial extent × time range of a point temporal value.
 */

import type { Point, Srid } from "@tempora/contracts";
import { InvalidTemporalError } from "@tempora/contracts";
import { isPointDomain } from "../domains/values";
import { formatNumber } from "../domains/scalar";
import type { Span } from "../spans/Span";
import type { Temporal } from "../temporal/Temporal";

export interface Extent {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  zmin?: number;
  zmax?: number;
}

export class STBox {
  constructor(
    readonly extent: Extent,
    readonly period: Span<"timestamp">,
    readonly srid: Srid = 0
  ) {}

  static of(temporal: Temporal<Point>): STBox {
    const { domain } = temporal;
    if (!isPointDomain(domain)) {
      throw new InvalidTemporalError(`stbox is defined for point values, not ${domain.kind}`);
    }
    const points = temporal.values();
    const xs = points.map((p) => p.x);
    const ys = points.map((p) => p.y);
    const zs = points.flatMap((p) => (p.z === undefined ? [] : [p.z]));
    const extent: Extent = {
      xmin: Math.min(...xs),
      xmax: Math.max(...xs),
      ymin: Math.min(...ys),
      ymax: Math.max(...ys),
    };
    if (zs.length === points.length) {
      extent.zmin = Math.min(...zs);
      extent.zmax = Math.max(...zs);
    }
    return new STBox(extent, temporal.period(), domain.srid);
  }

  hasZ(): boolean {
    return this.extent.zmin !== undefined && this.extent.zmax !== undefined;
  }

  expand(other: STBox): STBox {
    const a = this.extent;
    const b = other.extent;
    const extent: Extent = {
      xmin: Math.min(a.xmin, b.xmin),
      xmax: Math.max(a.xmax, b.xmax),
      ymin: Math.min(a.ymin, b.ymin),
      ymax: Math.max(a.ymax, b.ymax),
    };
    if (a.zmin !== undefined && a.zmax !== undefined && b.zmin !== undefined && b.zmax !== undefined) {
      extent.zmin = Math.min(a.zmin, b.zmin);
      extent.zmax = Math.max(a.zmax, b.zmax);
    }
    return new STBox(extent, this.period.union(other.period, false) ?? this.period, this.srid);
  }

  overlaps(other: STBox): boolean {
    const a = this.extent;
    const b = other.extent;
    return (
      a.xmin <= b.xmax &&
      b.xmin <= a.xmax &&
      a.ymin <= b.ymax &&
      b.ymin <= a.ymax &&
      this.period.overlaps(other.period)
    );
  }

  contains(other: STBox): boolean {
    const a = this.extent;
    const b = other.extent;
    return (
      a.xmin <= b.xmin &&
      b.xmax <= a.xmax &&
      a.ymin <= b.ymin &&
      b.ymax <= a.ymax &&
      this.period.contains(other.period)
    );
  }

  toString(): string {
    const { xmin, xmax, ymin, ymax, zmin, zmax } = this.extent;
    const z = zmin !== undefined && zmax !== undefined;
    const low = [xmin, ymin, ...(z ? [zmin] : [])].map((v) => formatNumber(v)).join(" ");
    const high = [xmax, ymax, ...(z ? [zmax] : [])].map((v) => formatNumber(v)).join(" ");
    const prefix = this.srid !== 0 ? `SRID=${this.srid};` : "";
    return `${prefix}STBOX ${z ? "ZT" : "XT"}(((${low}),(${high})),${this.period.toString()})`;
  }
}

export function stbox(temporal: Temporal<Point>): STBox {
  return STBox.of(temporal);
}
