export * from "./schemas/tle";
export * from "./schemas/job";
export * from "./schemas/telemetry";
export * from "./utils/constants";
export * from "./utils/errors";
export * from "./utils/tle";
export * from "./utils/job";
export * from "./utils/lifecycle";
export * from "./utils/telemetry";
