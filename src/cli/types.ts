import type { EntityRegistry } from "../entities";
import type { StatusPoller } from "../polling/poller";
import type { ZoneRouter } from "../router";

/**
 * Contexte public fourni par l'application pour attacher la CLI.
 */
export interface CliContext {
  router: ZoneRouter;
  entities: EntityRegistry;
  poller: StatusPoller;
  configPath?: string | null;
  /** Sortie des commandes (défaut: stdout). */
  print?: (line: string) => void;
  onExit?: () => Promise<void> | void;
}

export type CommandHandler = (args: string[], ctx: CliContext) => Promise<void> | void;
