import fs from "fs";
import path from "path";
import YAML from "yaml";
import chalk from "chalk";
import { z } from "zod";
import { levenshtein } from "./levenshtein";

const commandSchema = z.object({
  id: z.string(),
  name: z.string(),
  usage: z.string().optional(),
  description: z.string().optional(),
  danger: z.boolean().optional(),
  notes: z.array(z.string()).optional(),
  examples: z.array(z.string()).optional(),
  aliases: z.array(z.string()).optional(),
});

const helpSpecSchema = z.object({
  meta: z
    .object({
      program: z.string(),
      version: z.string().optional(),
      usage: z.string().optional(),
      legend: z.array(z.string()).optional(),
    })
    .optional(),
  context: z.object({ show: z.boolean().optional(), items: z.array(z.string()).optional() }).optional(),
  categories: z.array(z.object({ id: z.string(), title: z.string(), commands: z.array(commandSchema) })),
});

export type HelpSpec = z.infer<typeof helpSpecSchema>;
export type HelpCommand = z.infer<typeof commandSchema>;
export type HelpCategory = HelpSpec["categories"][number];

/**
 * Contexte d'exécution injecté dans l'en‑tête de l'aide.
 */
export interface HelpRuntimeContext {
  configPath?: string;
  host?: string;
  power?: string;
  availability?: string;
  logLevel?: string;
  nowIso?: string;
}

export type HelpFilter = { kind: "all" | "examples" | "category" | "command" | "json" | "search"; value?: string };

const HELP_CANDIDATES = [
  path.resolve(__dirname, "help.yaml"),
  // build: dist/cli ne contient pas le YAML
  path.resolve(process.cwd(), "src", "cli", "help.yaml"),
];

let cached: HelpSpec | null = null;

/**
 * Charger la spécification d'aide depuis `help.yaml` (mise en cache après la première lecture).
 * @throws Error si le fichier est introuvable ou ne respecte pas le schéma
 */
export function loadHelpSpec(): HelpSpec {
  if (cached) return cached;
  const filePath = HELP_CANDIDATES.find((p) => fs.existsSync(p));
  if (!filePath) throw new Error("help.yaml introuvable");
  const res = helpSpecSchema.safeParse(YAML.parse(fs.readFileSync(filePath, { encoding: "utf8" })));
  if (!res.success) throw new Error(`help.yaml invalide: ${res.error.issues.map((i) => i.path.join(".")).join(", ")}`);
  cached = res.data;
  return cached;
}

/** Toutes les commandes, toutes catégories confondues. */
export function flattenCommands(spec: HelpSpec): HelpCommand[] {
  return spec.categories.flatMap((c) => c.commands);
}

/** Noms et alias de commandes connus de l'aide. */
export function commandKeys(spec: HelpSpec): string[] {
  const keys = new Set<string>();
  for (const c of flattenCommands(spec)) {
    keys.add(c.name);
    for (const a of c.aliases ?? []) keys.add(a);
  }
  return [...keys];
}

type Palette = Record<"title" | "cmd" | "dim" | "danger", (s: string) => string>;

/**
 * Rendu de l'aide (cheatsheet par défaut, filtres possibles).
 * - Deux colonnes: commande | description
 * - Lignes suivantes: Usage / Exemples / Notes / Alias (dim)
 * - Contexte (en‑tête) si activé
 */
export function printHelp(spec: HelpSpec, runtime: HelpRuntimeContext = {}, filter?: HelpFilter): void {
  const width = Math.max(60, (process.stdout.columns || 80) - 2);
  const indent = "  ";

  const useColor = !!process.stdout.isTTY && !process.env.NO_COLOR;
  const color = (fn: (s: string) => string) => (s: string) => (useColor ? fn(s) : s);
  const c: Palette = {
    title: color(chalk.cyan),
    cmd: color(chalk.white),
    dim: color(chalk.dim),
    danger: color(chalk.yellow),
  };

  if (filter?.kind === "json") {
    writeLine(JSON.stringify(spec, null, 2));
    return;
  }

  const usage = spec.meta?.usage ?? `${spec.meta?.program ?? "hdmi-matrix-gw"} <commande> [arguments]`;
  writeLine(c.cmd(usage));
  const legendLines = spec.meta?.legend ?? [];
  if (legendLines.length > 0) writeLine(c.dim(legendLines.join(" | ")));

  if (spec.context?.show) {
    const ctxLines = (spec.context.items ?? []).map((t) => interpolateContext(t, runtime));
    for (const l of ctxLines) writeLine(c.dim(l));
    if (ctxLines.length > 0) writeLine("");
  }

  let categories: HelpCategory[] = spec.categories;
  const value = filter?.value;
  if (filter?.kind === "category" && value) {
    categories = spec.categories.filter((cat) => cat.id === value || norm(cat.title) === norm(value));
  } else if (filter?.kind === "search" && value) {
    const q = norm(value);
    categories = spec.categories
      .map((cat) => ({
        ...cat,
        commands: cat.commands.filter((cmd) => [cmd.name, cmd.usage, cmd.description].join("\n").toLowerCase().includes(q)),
      }))
      .filter((cat) => cat.commands.length > 0);
  } else if (filter?.kind === "command" && value) {
    const details = resolveCommand(flattenCommands(spec), value);
    if (!details) {
      const sugg = suggestions(flattenCommands(spec), value);
      writeLine(c.danger(`Commande inconnue: ${value}`));
      if (sugg.length > 0) writeLine(c.dim(`Voulez‑vous dire: ${sugg.join(", ")}`));
      return;
    }
    printCommandBlock(details, indent, c);
    return;
  }

  for (const cat of categories) {
    writeLine(c.title(cat.title));
    const cmds = [...cat.commands].sort((a, b) => a.name.localeCompare(b.name));
    for (const cmd of cmds) {
      if (filter?.kind === "examples") {
        if (cmd.examples && cmd.examples.length > 0) {
          writeLine(indent + c.cmd(cmd.name));
          for (const ex of cmd.examples) writeLine(indent + indent + c.dim("Ex.: " + ex));
        }
        continue;
      }
      const label = (cmd.danger ? "⚠️  " : "") + c.cmd(cmd.name);
      renderTwoCols(label, cmd.description ?? "", width, indent);
      if (cmd.usage) writeLine(indent + indent + c.dim("Usage: " + cmd.usage));
      if (cmd.examples && cmd.examples.length > 0) {
        writeLine(indent + indent + c.dim("Ex.:   " + cmd.examples.slice(0, 3).join("   |   ")));
      }
      if (cmd.aliases && cmd.aliases.length > 0) writeLine(indent + indent + c.dim("Alias: " + cmd.aliases.join(", ")));
      for (const n of cmd.notes ?? []) writeLine(indent + indent + (cmd.danger ? c.danger(n) : c.dim(n)));
    }
    writeLine("");
  }

  writeLine(c.dim("Tapez 'help <cmd>' pour l'aide détaillée, 'help routing' pour filtrer."));
}

function printCommandBlock(cmd: HelpCommand, indent: string, c: Palette): void {
  writeLine(c.cmd(cmd.name) + (cmd.description ? ": " + cmd.description : ""));
  if (cmd.usage) writeLine(indent + c.dim("Usage: " + cmd.usage));
  if (cmd.examples && cmd.examples.length > 0) {
    writeLine(indent + c.dim("Exemples:"));
    for (const ex of cmd.examples) writeLine(indent + indent + c.dim(ex));
  }
  if (cmd.aliases && cmd.aliases.length > 0) writeLine(indent + c.dim("Alias: " + cmd.aliases.join(", ")));
}

function renderTwoCols(left: string, right: string, width: number, indent: string): void {
  const MAX_LEFT_COL = 26;
  const leftStr = indent + left;
  const leftWidth = Math.min(MAX_LEFT_COL, stripAnsi(leftStr).length);
  const rightWidth = Math.max(10, width - leftWidth - 2);
  const rightLines = wrapText(right, rightWidth);
  writeLine(padRight(leftStr, leftWidth) + "  " + (rightLines[0] ?? ""));
  for (const line of rightLines.slice(1)) writeLine(" ".repeat(leftWidth) + "  " + line);
}

export function interpolateContext(template: string, ctx: HelpRuntimeContext): string {
  return template
    .replace(/\$\{config\.path\}/g, ctx.configPath ?? "./config.yaml")
    .replace(/\$\{matrix\.host\}/g, ctx.host ?? "—")
    .replace(/\$\{matrix\.power\}/g, ctx.power ?? "—")
    .replace(/\$\{matrix\.availability\}/g, ctx.availability ?? "—")
    .replace(/\$\{log\.level\}/g, ctx.logLevel ?? "info");
}

function resolveCommand(all: HelpCommand[], nameOrId: string): HelpCommand | null {
  const key = norm(nameOrId);
  return all.find((c) => [c.id, c.name, ...(c.aliases ?? [])].map(norm).includes(key)) ?? null;
}

function suggestions(all: HelpCommand[], input: string): string[] {
  const candidates = new Map<string, number>();
  for (const c of all) {
    for (const k of [c.id, c.name, ...(c.aliases ?? [])]) {
      const d = levenshtein(norm(input), norm(k));
      candidates.set(k, Math.min(candidates.get(k) ?? Infinity, d));
    }
  }
  return [...candidates.entries()]
    .sort((a, b) => a[1] - b[1])
    .slice(0, 3)
    .map(([k]) => k);
}

function norm(s: string): string { return s.trim().toLowerCase(); }

function padRight(s: string, width: number): string {
  const w = stripAnsi(s).length;
  return w >= width ? s : s + " ".repeat(width - w);
}

function stripAnsi(str: string): string {
  return str.replace(/[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g, "");
}

function writeLine(s: string): void { process.stdout.write(s + "\n"); }

function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const w of text.split(/\s+/).filter(Boolean)) {
    if (line.length === 0) { line = w; continue; }
    if ((line + " " + w).length <= width) {
      line += " " + w;
    } else {
      lines.push(line);
      line = w;
    }
  }
  if (line.length > 0) lines.push(line);
  return lines;
}
