export * from "./actors/orderActor";
export * from "./actors/stateActor";
export * from "./config/orderSettings";
export * from "./domain/errors";
export * from "./domain/pickupOptions";
export * from "./domain/pricing";
export type * from "./types/orderTypes";
