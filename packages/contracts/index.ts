export * from "./core/time";

export * from "./errors/errors";

// Span domains and bounds
export * from "./spans/spans";

// Base value domains (bool, int, float, text, point)
export * from "./values/values";

export * from "./temporal/temporal";

export * from "./codecs/codecs";
