import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { configFileSchema, type ConfigFile } from "./config/schema";
import { ConfigError, errorMessage } from "./errors";
import type { LogLevel } from "./logger";
import type { PollingOptions } from "./polling/poller";
import type { SourceId, ZoneId } from "./types";

/** Connexion à la matrice. */
export interface MatrixConnectionConfig {
  host: string;
  port?: number;
  /** Délai maximal par échange (ms). */
  timeoutMs: number;
  /** Pause après une commande d'alimentation (ms). */
  powerSettleMs: number;
  /** Allumer la matrice le temps d'un routage si elle est éteinte. */
  wakeOnRoute: boolean;
}

/**
 * Configuration racine de la passerelle, validée et normalisée.
 */
export interface AppConfig {
  matrix: MatrixConnectionConfig;
  polling: PollingOptions;
  /** Lire au démarrage les noms des tables non configurées depuis la matrice. */
  namesFromDevice: boolean;
  /** Zones configurées (id → nom), null = noms par défaut ou lus sur la matrice. */
  zones: ReadonlyMap<ZoneId, string> | null;
  sources: ReadonlyMap<SourceId, string> | null;
  logLevel: LogLevel | null;
}

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // candidat suivant
    }
  }
  return null;
}

function toTable(table: ConfigFile["zones"]): Map<number, string> | null {
  if (!table) return null;
  return new Map(
    Object.entries(table)
      .map(([id, port]) => [Number(id), port.name] as const)
      .sort((a, b) => a[0] - b[0]),
  );
}

/**
 * Valide le contenu YAML déjà parsé et le normalise.
 * @throws ConfigError avec un message par problème (chemin + cause)
 */
export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const res = configFileSchema.safeParse(raw ?? {});
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join(".") || "(racine)"}: ${i.message}`);
    throw new ConfigError(`Configuration invalide (${source})`, issues);
  }
  const cfg = res.data;
  return {
    matrix: {
      host: cfg.matrix.host,
      port: cfg.matrix.port,
      timeoutMs: cfg.matrix.timeout_ms,
      powerSettleMs: cfg.matrix.power_settle_ms,
      wakeOnRoute: cfg.matrix.wake_on_route,
    },
    polling: {
      intervalMs: cfg.polling.interval_ms,
      maxBackoffMs: cfg.polling.max_backoff_ms,
      unavailableAfter: cfg.polling.unavailable_after,
    },
    namesFromDevice: cfg.names_from_device,
    zones: toTable(cfg.zones),
    sources: toTable(cfg.sources),
    logLevel: cfg.log_level ?? null,
  };
}

async function readConfigFile(p: string): Promise<AppConfig> {
  const text = await fs.readFile(p, "utf8");
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`YAML illisible (${p})`, [errorMessage(err)]);
  }
  return parseConfig(raw, p);
}

/**
 * Charge, parse et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws ConfigError si aucun fichier n'est trouvé ou si le contenu est invalide
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new ConfigError("Aucun fichier de configuration trouvé (config.yaml)");
  }
  return readConfigFile(p);
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * Une configuration invalide est remontée à `onError` et n'interrompt pas l'observation.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: AppConfig) => void,
  onError?: (err: unknown) => void,
): () => Promise<void> {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async (): Promise<void> => {
    try {
      onChange(await readConfigFile(filePath));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => {
    void handler();
  });
  if (onError) watcher.on("error", onError);
  return () => watcher.close();
}
