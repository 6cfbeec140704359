export * from "./schemas/resources";
export * from "./schemas/catalog";
export * from "./schemas/modifier";
export * from "./schemas/requests";
export * from "./schemas/errors";
