import type { DeviceFailure } from "../errors";
import type { ZoneRouter } from "../router";
import { slugify } from "../shared/names";
import type { Result } from "../types";
import { entityState, type PowerSwitchSnapshot } from "./types";

/** Interrupteur d'alimentation globale de la matrice. */
export class PowerSwitch {
  readonly domain = "switch" as const;
  readonly uniqueId: string;
  readonly entityId: string;
  readonly name = "HDMI Matrix Power";

  constructor(private readonly router: ZoneRouter, private readonly isAvailable: () => boolean) {
    this.uniqueId = `${router.host}-power-switch`;
    this.entityId = `switch.${slugify(router.host)}_power`;
  }

  snapshot(): PowerSwitchSnapshot {
    return {
      domain: this.domain,
      uniqueId: this.uniqueId,
      entityId: this.entityId,
      name: this.name,
      state: entityState(this.isAvailable(), this.router.state.getPower()),
    };
  }

  turnOn(): Promise<Result<void, DeviceFailure>> {
    return this.router.setPower(true);
  }

  turnOff(): Promise<Result<void, DeviceFailure>> {
    return this.router.setPower(false);
  }
}
