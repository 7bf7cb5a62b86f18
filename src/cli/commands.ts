import fs from "fs";
import path from "path";
import { z } from "zod";
import { createLogger, LOG_LEVELS, parseLogLevel, setLogLevel } from "../logger";
import { errorMessage, InvalidActionDataError } from "../errors";
import type { EntitySnapshot, SetZoneOutcome } from "../entities";
import { loadHelpSpec, printHelp } from "./help";
import { buildHelpRuntimeContext, suggestFromSpec } from "./helpSupport";
import { tokenize } from "./tokenize";
import type { CliContext, CommandHandler } from "./types";

const log = createLogger("cli");

function out(ctx: CliContext): (line: string) => void {
  return ctx.print ?? ((line) => process.stdout.write(line + "\n"));
}

function powerLabel(power: boolean | null): string {
  if (power === null) return "inconnue";
  return power ? "ON" : "OFF";
}

function zoneLines(ctx: CliContext): string[] {
  return ctx.router.catalog.zones.list().map((zone) => {
    const source = ctx.router.zoneSourceName(zone.name);
    return `  [${zone.id}] ${zone.name} ← ${source ?? "?"}`;
  });
}

function describeEntity(snap: EntitySnapshot): string {
  if (snap.domain === "switch") return `${snap.entityId}  ${snap.state}`;
  return `${snap.entityId}  ${snap.state}  source=${snap.source ?? "?"}`;
}

const packageSchema = z.object({ name: z.string(), version: z.string() });

function readPackageInfo(): z.infer<typeof packageSchema> | null {
  for (const p of [path.resolve(__dirname, "../../package.json"), path.resolve(process.cwd(), "package.json")]) {
    try {
      const res = packageSchema.safeParse(JSON.parse(fs.readFileSync(p, "utf8")));
      if (res.success) return res.data;
    } catch (err) {
      log.trace(`package.json illisible (${p}): ${errorMessage(err)}`);
    }
  }
  return null;
}

export const handlers: Record<string, CommandHandler> = {
  zones(_args, ctx) {
    const print = out(ctx);
    print("Zones:");
    for (const line of zoneLines(ctx)) print(line);
  },
  sources(_args, ctx) {
    const print = out(ctx);
    print("Sources:");
    for (const s of ctx.router.catalog.sources.list()) print(`  [${s.id}] ${s.name}`);
  },
  status(_args, ctx) {
    const print = out(ctx);
    const state = ctx.router.getState();
    print(`Matrice: ${ctx.router.host}`);
    print(`Alimentation: ${powerLabel(state.power)}`);
    print(`Disponibilité: ${ctx.poller.isAvailable ? "disponible" : "indisponible"}`);
    print(`Mise à jour: ${state.updatedAt === null ? "jamais" : new Date(state.updatedAt).toISOString()}`);
    for (const line of zoneLines(ctx)) print(line);
  },
  async route(args, ctx) {
    const print = out(ctx);
    const [zone, source] = args;
    if (args.length !== 2 || zone === undefined || source === undefined) {
      print('Usage: route <zone> <source>  (ex: route "Main TV Source" "Xbox 360")');
      return;
    }
    const res = await ctx.router.route(zone, source);
    print(res.ok ? `OK: '${zone}' ← '${source}'` : `Échec: ${res.error.message}`);
  },
  async power(args, ctx) {
    const print = out(ctx);
    const arg = (args[0] ?? "").toLowerCase();
    if (arg !== "on" && arg !== "off") {
      print("Usage: power <on|off>");
      return;
    }
    const res = await ctx.router.setPower(arg === "on");
    print(res.ok ? `OK: alimentation ${arg.toUpperCase()}` : `Échec: ${res.error.message}`);
  },
  async refresh(_args, ctx) {
    const print = out(ctx);
    const outcome = await ctx.poller.tick();
    if (outcome === "skipped") {
      print("Commande en cours: rafraîchissement ignoré");
      return;
    }
    if (outcome !== "ok") {
      print(`Échec du rafraîchissement (${outcome})`);
      return;
    }
    for (const line of zoneLines(ctx)) print(line);
  },
  entities(_args, ctx) {
    const print = out(ctx);
    for (const snap of ctx.entities.snapshots()) print(describeEntity(snap));
  },
  async set_zone(args, ctx) {
    const print = out(ctx);
    const [target, source] = args;
    if (args.length !== 2 || target === undefined || source === undefined) {
      print("Usage: set_zone <entity_id|all> <source>");
      return;
    }
    const data = target === "all" ? { source } : { entity_id: target, source };
    let outcomes: SetZoneOutcome[];
    try {
      outcomes = await ctx.entities.setZone(data);
    } catch (err) {
      if (!(err instanceof InvalidActionDataError)) throw err;
      print(`Échec: ${err.message}`);
      return;
    }
    for (const o of outcomes) {
      print(o.result.ok ? `${o.entityId}: OK` : `${o.entityId}: ${o.result.error.message}`);
    }
  },
  log(args, ctx) {
    const print = out(ctx);
    const level = parseLogLevel(args[0]);
    if (!level) {
      print(`Usage: log <${LOG_LEVELS.join("|")}>`);
      return;
    }
    setLogLevel(level);
    print(`Niveau de log: ${level}`);
  },
  help(args, ctx) {
    try {
      const spec = loadHelpSpec();
      const runtime = buildHelpRuntimeContext(ctx);
      const arg = args.join(" ").trim();
      if (arg === "--json" || arg === "json") { printHelp(spec, runtime, { kind: "json" }); return; }
      if (!arg) { printHelp(spec, runtime); return; }
      if (arg === "all") { printHelp(spec, runtime, { kind: "all" }); return; }
      if (arg === "examples") { printHelp(spec, runtime, { kind: "examples" }); return; }
      if (arg.startsWith("search ")) { printHelp(spec, runtime, { kind: "search", value: arg.slice(7) }); return; }
      const cat = spec.categories.find((c) => c.id === arg || c.title.toLowerCase().includes(arg.toLowerCase()));
      if (cat) { printHelp(spec, runtime, { kind: "category", value: cat.id }); return; }
      printHelp(spec, runtime, { kind: "command", value: arg });
    } catch (err) {
      out(ctx)(`Aide CLI indisponible (${errorMessage(err)}).`);
    }
  },
  version(_args, ctx) {
    const pkg = readPackageInfo();
    out(ctx)(pkg ? `${pkg.name} ${pkg.version}` : "hdmi-matrix-gw");
  },
  clear() {
    process.stdout.write("\x1B[2J\x1B[3J\x1B[H");
  },
  async exit(_args, ctx) {
    await ctx.onExit?.();
  },
};

const ALIASES: Record<string, string> = {
  quit: "exit",
  "-h": "help",
  "--help": "help",
  "-v": "version",
  "--version": "version",
};

/**
 * Exécute une ligne saisie. Une commande inconnue affiche jusqu'à 3 suggestions.
 * @returns false si la ligne était vide ou la commande inconnue
 */
export async function runCommand(line: string, ctx: CliContext): Promise<boolean> {
  const [raw, ...args] = tokenize(line.trim());
  if (raw === undefined) return false;
  const name = ALIASES[raw] ?? raw;
  const handler = Object.prototype.hasOwnProperty.call(handlers, name) ? handlers[name] : undefined;
  if (!handler) {
    const print = out(ctx);
    print(`Commande inconnue: '${raw}'. Tapez 'help'.`);
    try {
      const suggestions = suggestFromSpec(loadHelpSpec(), raw);
      if (suggestions.length > 0) print(`Suggestions: ${suggestions.join(", ")}`);
    } catch (err) {
      log.debug("Suggestions indisponibles:", err);
    }
    return false;
  }
  await handler(args, ctx);
  return true;
}
