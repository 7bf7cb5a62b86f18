import type { CompleterResult } from "readline";
import { LOG_LEVELS } from "../logger";
import { commandKeys, loadHelpSpec } from "./help";
import { tokenize } from "./tokenize";
import type { CliContext } from "./types";

function norm(s: string): string { return s.trim().toLowerCase(); }

/** Met un nom entre guillemets s'il contient des espaces. */
function quote(name: string): string {
  return /\s/.test(name) ? `"${name}"` : name;
}

/**
 * Auto‑complétion readline: noms de commandes, puis arguments selon la
 * commande (zones, sources, entités, on/off, niveaux de log).
 */
export function makeCompleter(ctx: CliContext): (line: string) => CompleterResult {
  return (line: string): CompleterResult => {
    const trailingSpace = /\s$/.test(line);
    const words = tokenize(line);
    const lastRaw = trailingSpace ? "" : line.slice(line.lastIndexOf(" ") + 1);
    const lastToken = trailingSpace ? "" : (words[words.length - 1] ?? "");

    const suggestLast = (candidates: string[]): CompleterResult => {
      const uniq = [...new Set(candidates.filter(Boolean))];
      const hits = lastToken ? uniq.filter((x) => norm(x).startsWith(norm(lastToken))) : uniq;
      return [(hits.length ? hits : uniq).map(quote), lastRaw];
    };

    let commands: string[];
    try {
      commands = commandKeys(loadHelpSpec());
    } catch {
      commands = ["help", "exit", "quit"];
    }

    const argIndex = trailingSpace ? words.length - 1 : words.length - 2;
    if (argIndex < 0) return suggestLast(commands);

    const zones = ctx.router.catalog.zones.names();
    const sources = ctx.router.catalog.sources.names();
    switch (norm(words[0] ?? "")) {
      case "route":
        return suggestLast(argIndex === 0 ? zones : sources);
      case "set_zone":
        return suggestLast(argIndex === 0 ? ["all", ...ctx.entities.players.map((p) => p.entityId)] : sources);
      case "power":
        return suggestLast(["on", "off"]);
      case "log":
        return suggestLast([...LOG_LEVELS]);
      case "help":
        return suggestLast(["all", "examples", "json", "search", ...commands]);
      default:
        return [[], lastRaw];
    }
  };
}
