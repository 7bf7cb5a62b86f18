/**
 * Types transverses de la passerelle.
 */

/** Nombre de ports de la matrice (entrées comme sorties). */
export const MATRIX_PORTS = 8;

/** Identifiant physique d'une sortie (zone), 1..8. */
export type ZoneId = number;

/** Identifiant physique d'une entrée (source), 1..8. */
export type SourceId = number;

/** Résultat explicite d'une opération: succès avec valeur, ou erreur typée. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Port nommé (zone ou source). */
export interface NamedPort {
  readonly id: number;
  readonly name: string;
}

/**
 * État connu de la matrice. `null` = inconnu (jamais déduit, seulement
 * alimenté par un accusé de commande ou une lecture d'état réussie).
 */
export interface DeviceState {
  readonly power: boolean | null;
  readonly sources: ReadonlyMap<ZoneId, SourceId | null>;
  /** Horodatage (ms) de la dernière mutation réussie, null tant que rien n'est connu. */
  readonly updatedAt: number | null;
}
