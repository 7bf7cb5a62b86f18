export { EntityRegistry, SET_ZONE_ACTION, setZoneSchema } from "./registry";
export type { SetZoneData, SetZoneOutcome } from "./registry";
export { PowerSwitch } from "./powerSwitch";
export { ZonePlayer } from "./zonePlayer";
export * from "./types";
