/**
 * Détection de l'environnement d'exécution.
 */

type Env = Record<string, string | undefined>;

/**
 * Détecte une exécution sous PM2 (variables pm_id, NODE_APP_INSTANCE ou PM2_HOME).
 */
export function isRunningUnderPm2(env: Env = process.env): boolean {
  return Boolean(env.pm_id || env.NODE_APP_INSTANCE || env.PM2_HOME);
}

/**
 * Indique si la CLI interactive doit être attachée: terminal interactif,
 * hors PM2, et `DISABLE_CLI` différent de "true".
 */
export function shouldAttachCli(env: Env = process.env, isTTY: boolean = Boolean(process.stdin.isTTY)): boolean {
  if (env.DISABLE_CLI === "true") return false;
  if (isRunningUnderPm2(env)) return false;
  return isTTY;
}
