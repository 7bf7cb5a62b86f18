export { DeviceStateStore } from "./store";
export type { StateChange, StateListener, StateOrigin } from "./types";
