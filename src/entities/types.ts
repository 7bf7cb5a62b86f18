import type { ZoneId } from "../types";

export type EntityState = "on" | "off" | "unknown" | "unavailable";

interface EntityBase {
  /** Identifiant stable (ne change pas si la zone est renommée côté hôte). */
  uniqueId: string;
  /** `<domaine>.<slug>` */
  entityId: string;
  name: string;
  state: EntityState;
}

export interface PowerSwitchSnapshot extends EntityBase {
  domain: "switch";
}

export interface ZonePlayerSnapshot extends EntityBase {
  domain: "media_player";
  zoneId: ZoneId;
  /** Source courante, null si inconnue ou hors table. */
  source: string | null;
  sourceList: string[];
  mediaTitle: string | null;
}

export type EntitySnapshot = PowerSwitchSnapshot | ZonePlayerSnapshot;

export type EntityListener = (snapshot: EntitySnapshot) => void;

/** Disponibilité de la matrice vue par les entités (le `StatusPoller` en production). */
export interface AvailabilitySource {
  readonly isAvailable: boolean;
  onAvailabilityChange(listener: (available: boolean) => void): () => void;
}

export function entityState(available: boolean, power: boolean | null): EntityState {
  if (!available) return "unavailable";
  if (power === null) return "unknown";
  return power ? "on" : "off";
}
