import { logger, setLogLevel, parseLogLevel } from "./logger";
import { loadConfig, findConfigPath, watchConfig, type AppConfig } from "./config";
import { shouldAttachCli } from "./utils/runtime";
import { attachCli } from "./cli";
import { buildRuntime, restartRequiredChanges } from "./app/bootstrap";
import { ConfigError } from "./errors";

export interface StartOptions {
  /** Chemin explicite (`--config`), sinon `MATRIX_CONFIG`, sinon recherche par défaut. */
  configPath?: string;
}

/**
 * Point d'entrée de l'application.
 * - Charge et valide la configuration, construit les tables et le `ZoneRouter`
 * - Démarre le polling et branche les entités
 * - Active le hot‑reload de la configuration et la CLI interactive
 *
 * @returns Fonction de nettoyage (arrêt propre des composants)
 */
export async function startApp(options: StartOptions = {}): Promise<() => Promise<void>> {
  logger.info("Démarrage passerelle matrice HDMI…");
  const configPath = await findConfigPath(options.configPath ?? process.env.MATRIX_CONFIG);
  if (!configPath) {
    throw new ConfigError("config.yaml introuvable. Copiez config.example.yaml → config.yaml");
  }
  logger.info(`Chargement configuration: ${configPath}`);
  let cfg: AppConfig = await loadConfig(configPath);
  // LOG_LEVEL (env) prime sur la config
  if (cfg.logLevel && !parseLogLevel(process.env.LOG_LEVEL)) setLogLevel(cfg.logLevel);

  const { router, poller, entities } = await buildRuntime(cfg);
  entities.attach();
  const unsubEntities = entities.subscribe((snap) => {
    logger.debug(`Entité ${snap.entityId}: ${snap.state}`);
  });
  poller.start();

  const stopWatch = watchConfig(
    configPath,
    (next) => {
      const restart = restartRequiredChanges(cfg, next);
      if (next.logLevel && !parseLogLevel(process.env.LOG_LEVEL)) setLogLevel(next.logLevel);
      poller.updateOptions(next.polling);
      cfg = next;
      logger.info("Configuration rechargée.");
      if (restart.length > 0) logger.warn(`Redémarrage requis pour appliquer: ${restart.join(", ")}`);
    },
    (err) => logger.warn("Erreur hot reload config:", err),
  );

  let detachCli: () => void = () => {};
  let isCleaningUp = false;
  const cleanup = async (): Promise<void> => {
    if (isCleaningUp) return;
    isCleaningUp = true;
    logger.info("Arrêt passerelle matrice HDMI");
    detachCli();
    poller.stop();
    unsubEntities();
    entities.detach();
    try {
      await stopWatch();
    } catch (err) {
      logger.warn("Arrêt du watcher config:", err);
    }
    await router.shutdown();
    process.exit(0);
  };

  // N'attacher la CLI que dans un terminal interactif (pas sous PM2)
  if (shouldAttachCli()) {
    logger.info("CLI activée (session interactive détectée).");
    detachCli = attachCli({ router, entities, poller, configPath, onExit: cleanup });
  } else {
    logger.info("CLI désactivée (PM2, DISABLE_CLI=true ou stdin non interactif).");
  }

  const stop = (reason: string, err?: unknown): void => {
    if (err !== undefined) logger.error(`${reason}:`, err);
    cleanup().catch((e: unknown) => {
      logger.error("Arrêt en échec:", e);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("uncaughtException", (err: unknown) => stop("Uncaught exception", err));
  process.on("unhandledRejection", (reason: unknown) => stop("Unhandled rejection", reason));

  return cleanup;
}
