import readline from "readline";
import { createLogger } from "../logger";
import { runCommand } from "./commands";
import { makeCompleter } from "./completer";
import { loadHelpSpec, printHelp } from "./help";
import { buildHelpRuntimeContext } from "./helpSupport";
import type { CliContext } from "./types";

export type { CliContext } from "./types";

const log = createLogger("cli");

/**
 * Attache la console interactive sur stdin/stdout.
 * @returns Fonction pour détacher la CLI (ferme readline)
 */
export function attachCli(ctx: CliContext): () => void {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    completer: makeCompleter(ctx),
  });
  let closing = false;

  try {
    printHelp(loadHelpSpec(), buildHelpRuntimeContext(ctx), { kind: "category", value: "routing" });
  } catch (err) {
    log.debug("Aide indisponible:", err);
    process.stdout.write("Aide CLI indisponible (help.yaml introuvable ou invalide). Tapez 'help'.\n");
  }
  rl.setPrompt("matrix> ");
  rl.prompt();

  rl.on("line", (line) => {
    void runCommand(line, ctx)
      .catch((err: unknown) => {
        log.error("Erreur CLI:", err);
      })
      .finally(() => {
        if (!closing) rl.prompt();
      });
  });

  rl.on("close", () => {
    if (closing) return;
    closing = true;
    // Ctrl+D / Ctrl+C sur la console: arrêt ordonné
    void Promise.resolve(ctx.onExit?.()).catch((err: unknown) => {
      log.error("Arrêt depuis la CLI en échec:", err);
    });
  });

  return () => {
    closing = true;
    rl.close();
  };
}
