export * from "./Coordinate";
export * from "./CoordinateSpace";
