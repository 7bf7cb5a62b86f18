import type { RouteError } from "../errors";
import type { ZoneRouter } from "../router";
import type { NamedPort, Result } from "../types";
import { entityState, type ZonePlayerSnapshot } from "./types";

/**
 * Lecteur « media player » d'une zone: expose la source courante et la liste
 * des sources sélectionnables. L'état suit l'alimentation globale.
 */
export class ZonePlayer {
  readonly domain = "media_player" as const;
  readonly uniqueId: string;

  constructor(
    private readonly router: ZoneRouter,
    readonly zone: NamedPort,
    readonly entityId: string,
    private readonly isAvailable: () => boolean,
  ) {
    this.uniqueId = `${router.host}-output-${zone.id}`;
  }

  get name(): string {
    return this.zone.name;
  }

  snapshot(): ZonePlayerSnapshot {
    const state = entityState(this.isAvailable(), this.router.state.getPower());
    const source = this.router.zoneSourceName(this.zone.name);
    let mediaTitle: string | null = null;
    if (state === "off") mediaTitle = "Powered Off";
    else if (state === "on" && source !== null) mediaTitle = `${source} on ${this.zone.name}`;
    return {
      domain: this.domain,
      uniqueId: this.uniqueId,
      entityId: this.entityId,
      name: this.zone.name,
      state,
      zoneId: this.zone.id,
      source,
      sourceList: this.router.catalog.sources.names(),
      mediaTitle,
    };
  }

  selectSource(source: string): Promise<Result<void, RouteError>> {
    return this.router.route(this.zone.name, source);
  }
}
