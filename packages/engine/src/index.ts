export * from "./state";
export * from "./maps";
export * from "./allocation";
export * from "./modifiers";
export * from "./transport";
export * from "./production";
export * from "./recruitment";
