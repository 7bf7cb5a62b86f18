import type { DeviceState } from "../types";

/** Origine d'une mutation de l'état connu. */
export type StateOrigin = "route" | "power" | "poll";

/** Notification émise après une mutation effective de l'état. */
export interface StateChange {
  origin: StateOrigin;
  state: DeviceState;
  previous: DeviceState;
}

export type StateListener = (change: StateChange) => void;
