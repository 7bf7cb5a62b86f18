/**
 * Erreurs métier de la passerelle. Chaque classe porte un `kind` discriminant
 * pour que les appelants puissent brancher sans `instanceof`.
 */
export type MatrixErrorKind = "UnknownZone" | "UnknownSource" | "UnknownEntity" | "DeviceUnreachable" | "DeviceError";

export abstract class MatrixError extends Error {
  abstract readonly kind: MatrixErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Nom de zone absent de la table configurée (aucun contact avec la matrice). */
export class UnknownZoneError extends MatrixError {
  readonly kind = "UnknownZone" as const;

  constructor(readonly zone: string) {
    super(`Zone inconnue: '${zone}'`);
  }
}

/** Nom de source absent de la table configurée (aucun contact avec la matrice). */
export class UnknownSourceError extends MatrixError {
  readonly kind = "UnknownSource" as const;

  constructor(readonly source: string) {
    super(`Source inconnue: '${source}'`);
  }
}

/** Entité ciblée par une action (`set_zone`) qui n'existe pas. */
export class UnknownEntityError extends MatrixError {
  readonly kind = "UnknownEntity" as const;

  constructor(readonly entityId: string) {
    super(`Entité inconnue: '${entityId}'`);
  }
}

/** Connexion impossible ou délai dépassé. */
export class DeviceUnreachableError extends MatrixError {
  readonly kind = "DeviceUnreachable" as const;

  constructor(readonly host: string, reason: string, options?: { cause?: unknown }) {
    super(`Matrice injoignable (${host}): ${reason}`, options);
  }
}

/** Réponse en échec, illisible, ou accusé de réception qui ne correspond pas à la requête. */
export class DeviceError extends MatrixError {
  readonly kind = "DeviceError" as const;

  constructor(reason: string, readonly reply?: unknown, options?: { cause?: unknown }) {
    super(`Réponse matrice invalide: ${reason}`, options);
  }
}

export type DeviceFailure = DeviceUnreachableError | DeviceError;
export type RouteError = UnknownZoneError | UnknownSourceError | DeviceFailure;

export function isDeviceFailure(err: unknown): err is DeviceFailure {
  return err instanceof DeviceUnreachableError || err instanceof DeviceError;
}

/** Violation d'un invariant des tables zones/sources (ids, noms). */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

/** Fichier de configuration absent ou invalide. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

/** Données d'action refusées par le schéma. */
export class InvalidActionDataError extends Error {
  constructor(action: string, readonly issues: string[]) {
    super(`Données invalides pour '${action}': ${issues.join("; ")}`);
    this.name = "InvalidActionDataError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
