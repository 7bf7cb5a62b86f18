import type { DeviceState, SourceId, ZoneId } from "../types";
import { MATRIX_PORTS } from "../types";
import type { StateListener, StateOrigin } from "./types";
import { createLogger } from "../logger";

const log = createLogger("state");

/**
 * Stocke l'état connu de la matrice (alimentation + source par zone) et notifie
 * les abonnés à chaque mutation effective.
 *
 * Invariants:
 * - L'état initial est « inconnu » (power = null, toutes les zones à null)
 * - Seuls un accusé de commande ou une lecture d'état réussie le modifient
 */
export class DeviceStateStore {
  private power: boolean | null = null;
  private readonly sources: Map<ZoneId, SourceId | null> = new Map();
  private updatedAt: number | null = null;
  private readonly subscribers: Set<StateListener> = new Set();

  constructor(private readonly now: () => number = Date.now) {
    for (let zone = 1; zone <= MATRIX_PORTS; zone++) this.sources.set(zone, null);
  }

  /** Copie détachée de l'état courant. */
  snapshot(): DeviceState {
    return { power: this.power, sources: new Map(this.sources), updatedAt: this.updatedAt };
  }

  getSource(zone: ZoneId): SourceId | null {
    return this.sources.get(zone) ?? null;
  }

  getPower(): boolean | null {
    return this.power;
  }

  /** Accusé d'une commande de routage. */
  applyRoute(zone: ZoneId, source: SourceId): void {
    this.mutate("route", () => {
      this.sources.set(zone, source);
    });
  }

  /** Accusé d'une commande d'alimentation. */
  applyPower(on: boolean): void {
    this.mutate("power", () => {
      this.power = on;
    });
  }

  /**
   * Résultat d'une lecture d'état complète. Les zones absentes de `sources`
   * gardent leur valeur précédente.
   */
  applyStatus(power: boolean, sources: ReadonlyMap<ZoneId, SourceId | null>): void {
    this.mutate("poll", () => {
      this.power = power;
      for (const [zone, source] of sources) {
        if (this.sources.has(zone)) this.sources.set(zone, source);
      }
    });
  }

  /**
   * Abonne un listener aux mutations effectives (pas d'émission si rien n'a changé).
   * @returns Fonction pour se désabonner
   */
  subscribe(listener: StateListener): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  private mutate(origin: StateOrigin, apply: () => void): void {
    const previous = this.snapshot();
    apply();
    this.updatedAt = this.now();
    if (!hasChanged(previous, this)) return;
    const state = this.snapshot();
    for (const fn of this.subscribers) {
      // un abonné défaillant ne doit pas bloquer les autres
      try { fn({ origin, state, previous }); } catch (err) { log.warn("Abonné state en erreur:", err); }
    }
  }
}

function hasChanged(previous: DeviceState, store: DeviceStateStore): boolean {
  if (previous.power !== store.getPower()) return true;
  for (const [zone, source] of previous.sources) {
    if (store.getSource(zone) !== source) return true;
  }
  return false;
}
