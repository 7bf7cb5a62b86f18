import path from "path";
import { getLogLevel } from "../logger";
import type { HelpRuntimeContext, HelpSpec } from "./help";
import { commandKeys } from "./help";
import { levenshtein } from "./levenshtein";
import type { CliContext } from "./types";

/**
 * Calcule jusqu'à 3 suggestions de commandes proches d'une saisie inconnue
 * (distance ≤ 2), triées par similarité croissante.
 */
export function suggestFromSpec(spec: HelpSpec, input: string): string[] {
  const scored = commandKeys(spec).map((k) => ({ k, d: levenshtein(k.toLowerCase(), input.toLowerCase()) }));
  scored.sort((a, b) => a.d - b.d);
  return scored.filter((x) => x.d <= 2).slice(0, 3).map((x) => x.k);
}

/**
 * Construit le contexte d'en‑tête pour le rendu de l'aide: chemin de config,
 * matrice, alimentation, disponibilité et niveau de log.
 */
export function buildHelpRuntimeContext(ctx: CliContext): HelpRuntimeContext {
  const power = ctx.router.state.getPower();
  return {
    configPath: path.resolve(process.cwd(), ctx.configPath ?? "config.yaml"),
    host: ctx.router.host,
    power: power === null ? "inconnue" : power ? "ON" : "OFF",
    availability: ctx.poller.isAvailable ? "disponible" : "indisponible",
    logLevel: getLogLevel(),
    nowIso: new Date().toISOString(),
  };
}
