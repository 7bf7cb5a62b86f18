import { z } from "zod";
import { createLogger } from "../logger";
import { InvalidActionDataError, UnknownEntityError, type RouteError } from "../errors";
import type { ZoneRouter } from "../router";
import { dedupeNames, slugify } from "../shared/names";
import { err, type Result } from "../types";
import { PowerSwitch } from "./powerSwitch";
import { ZonePlayer } from "./zonePlayer";
import type { AvailabilitySource, EntityListener, EntitySnapshot } from "./types";

const log = createLogger("entities");

export const SET_ZONE_ACTION = "set_zone";

export const setZoneSchema = z
  .object({
    entity_id: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
    source: z.string().min(1),
  })
  .strict();

export type SetZoneData = z.infer<typeof setZoneSchema>;

export interface SetZoneOutcome {
  entityId: string;
  result: Result<void, RouteError | UnknownEntityError>;
}

/**
 * Entités exposées à l'hôte: un interrupteur d'alimentation et un lecteur par
 * zone configurée. Notifie les abonnés quand l'instantané d'une entité change.
 */
export class EntityRegistry {
  readonly power: PowerSwitch;
  readonly players: readonly ZonePlayer[];
  private readonly listeners = new Set<EntityListener>();
  private readonly lastEmitted = new Map<string, string>();
  private detachers: Array<() => void> = [];

  constructor(private readonly router: ZoneRouter, private readonly availability?: AvailabilitySource) {
    const isAvailable = (): boolean => this.availability?.isAvailable ?? true;
    this.power = new PowerSwitch(router, isAvailable);
    const zones = router.catalog.zones.list();
    const slugs = dedupeNames(zones.map((zone) => slugify(zone.name)));
    this.players = zones.map((zone, i) => new ZonePlayer(router, zone, `media_player.${slugs[i] ?? zone.id}`, isAvailable));
    for (const snap of this.snapshots()) this.lastEmitted.set(snap.entityId, JSON.stringify(snap));
  }

  snapshots(): EntitySnapshot[] {
    return [this.power.snapshot(), ...this.players.map((p) => p.snapshot())];
  }

  player(entityId: string): ZonePlayer | undefined {
    return this.players.find((p) => p.entityId === entityId);
  }

  /** Branche le registre sur l'état connu et la disponibilité. */
  attach(): void {
    if (this.detachers.length > 0) return;
    this.detachers.push(this.router.state.subscribe(() => this.emitChanges()));
    if (this.availability) this.detachers.push(this.availability.onAvailabilityChange(() => this.emitChanges()));
  }

  detach(): void {
    for (const off of this.detachers) off();
    this.detachers = [];
  }

  /**
   * @returns Fonction pour se désabonner
   */
  subscribe(listener: EntityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Action `set_zone`: route `source` vers chaque lecteur ciblé (tous si `entity_id` absent ou vide).
   * Les routages sont exécutés l'un après l'autre, un résultat par entité.
   * @throws InvalidActionDataError si `data` ne respecte pas le schéma
   */
  async setZone(data: unknown): Promise<SetZoneOutcome[]> {
    const parsed = setZoneSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidActionDataError(
        SET_ZONE_ACTION,
        parsed.error.issues.map((i) => `${i.path.join(".") || "(racine)"}: ${i.message}`),
      );
    }
    const { entity_id, source } = parsed.data;
    // une liste vide cible tous les lecteurs, comme un entity_id absent
    const requested = typeof entity_id === "string" ? [entity_id] : (entity_id ?? []);
    const targets = requested.length > 0 ? requested : this.players.map((p) => p.entityId);

    const outcomes: SetZoneOutcome[] = [];
    for (const entityId of targets) {
      const player = this.player(entityId);
      if (!player) {
        log.warn(`${SET_ZONE_ACTION}: entité inconnue '${entityId}'`);
        outcomes.push({ entityId, result: err(new UnknownEntityError(entityId)) });
        continue;
      }
      outcomes.push({ entityId, result: await player.selectSource(source) });
    }
    return outcomes;
  }

  private emitChanges(): void {
    for (const snap of this.snapshots()) {
      const serialized = JSON.stringify(snap);
      if (this.lastEmitted.get(snap.entityId) === serialized) continue;
      this.lastEmitted.set(snap.entityId, serialized);
      log.debug(`${snap.entityId} → ${snap.state}`);
      for (const fn of this.listeners) {
        try { fn(snap); } catch (e) { log.warn("Abonné entités en erreur:", e); }
      }
    }
  }
}
