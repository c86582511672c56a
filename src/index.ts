/**
 * coordinate-space
 *
 * Immutable keyed coordinates with elementwise arithmetic and configurable ordering.
 */

// Core
export * from "./math/MathContainer";
export * from "./math/MathRecord";
export * from "./math/operators";
export { isNumericMapping } from "./math/inputs";

// Coordinates
export * from "./coordinates";

// Ambient
export * from "./errors";
export * from "./config/coordinateConfig";
export * from "./debug/CoordinateDebugLogger";
export type * from "./types";
