// Time
export * from "./time/timestamps";

// Scalar and value domains
export * from "./domains/scalar";
export * from "./domains/values";

// Spans
export * from "./spans/Span";
export { SpanSet } from "./spans/SpanSet";

// Interpolation
export { assertInterpolation, interpolate, locate } from "./interpolation/interpolate";

// Temporal values
export * from "./temporal";

// Bounding boxes
export { TBox, tbox } from "./boxes/TBox";
export { STBox, stbox, type Extent } from "./boxes/STBox";
