import { buildCatalog, type MatrixCatalog } from "../catalog/catalog";
import type { AppConfig } from "../config";
import { discoverNames } from "../drivers/matrix/discovery";
import { HttpMatrixTransport, type MatrixTransport } from "../drivers/matrix/transport";
import { EntityRegistry } from "../entities";
import { errorMessage, isDeviceFailure } from "../errors";
import { createLogger } from "../logger";
import { StatusPoller } from "../polling/poller";
import { ZoneRouter } from "../router";
import { MATRIX_PORTS, type SourceId, type ZoneId } from "../types";

const log = createLogger("app");

export interface Runtime {
  catalog: MatrixCatalog;
  router: ZoneRouter;
  poller: StatusPoller;
  entities: EntityRegistry;
}

export interface RuntimeDeps {
  /** Remplace le transport HTTP (tests). */
  transport?: MatrixTransport;
  sleep?: (ms: number) => Promise<void>;
}

function toTable(names: readonly string[]): Map<number, string> {
  return new Map(names.slice(0, MATRIX_PORTS).map((name, i) => [i + 1, name] as const));
}

/**
 * Construit les tables zones/sources: configurées, sinon lues sur la matrice
 * (`names_from_device`), sinon noms par défaut.
 * @throws CatalogError si une table configurée viole un invariant
 */
export async function resolveCatalog(config: AppConfig, transport: MatrixTransport): Promise<MatrixCatalog> {
  let zones: ReadonlyMap<ZoneId, string> | null = config.zones;
  let sources: ReadonlyMap<SourceId, string> | null = config.sources;

  if (config.namesFromDevice && (zones === null || sources === null)) {
    try {
      const found = await discoverNames(transport, config.matrix.timeoutMs);
      if (zones === null && found.zones.length > 0) zones = toTable(found.zones);
      if (sources === null && found.sources.length > 0) sources = toTable(found.sources);
      log.info("Noms lus sur la matrice");
    } catch (err) {
      if (!isDeviceFailure(err)) throw err;
      log.warn(`Lecture des noms impossible, noms par défaut utilisés: ${errorMessage(err)}`);
    }
  }
  return buildCatalog({ zones, sources });
}

/**
 * Assemble transport, routeur, poller et entités à partir de la configuration.
 * Rien n'est démarré: l'appelant lance le poller et branche les entités.
 */
export async function buildRuntime(config: AppConfig, deps: RuntimeDeps = {}): Promise<Runtime> {
  const transport = deps.transport ?? new HttpMatrixTransport({ host: config.matrix.host, port: config.matrix.port });
  const catalog = await resolveCatalog(config, transport);
  const router = new ZoneRouter({
    catalog,
    transport,
    timeoutMs: config.matrix.timeoutMs,
    powerSettleMs: config.matrix.powerSettleMs,
    wakeOnRoute: config.matrix.wakeOnRoute,
    sleep: deps.sleep,
  });
  const poller = new StatusPoller(router, config.polling);
  const entities = new EntityRegistry(router, poller);
  log.info(`Matrice ${router.host}: ${catalog.zones.size} zone(s), ${catalog.sources.size} source(s)`);
  return { catalog, router, poller, entities };
}

function sameTable(a: ReadonlyMap<number, string> | null, b: ReadonlyMap<number, string> | null): boolean {
  if (a === null || b === null) return a === b;
  if (a.size !== b.size) return false;
  for (const [id, name] of a) if (b.get(id) !== name) return false;
  return true;
}

/**
 * Réglages modifiés qui ne prennent effet qu'au redémarrage (tables et connexion figées).
 */
export function restartRequiredChanges(prev: AppConfig, next: AppConfig): string[] {
  const changes: string[] = [];
  const a = prev.matrix;
  const b = next.matrix;
  if (a.host !== b.host || a.port !== b.port) changes.push("matrix.host/port");
  if (a.timeoutMs !== b.timeoutMs || a.powerSettleMs !== b.powerSettleMs || a.wakeOnRoute !== b.wakeOnRoute) {
    changes.push("matrix");
  }
  if (!sameTable(prev.zones, next.zones)) changes.push("zones");
  if (!sameTable(prev.sources, next.sources)) changes.push("sources");
  if (prev.namesFromDevice !== next.namesFromDevice) changes.push("names_from_device");
  return changes;
}
