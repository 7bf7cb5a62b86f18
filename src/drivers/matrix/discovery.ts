import { createLogger } from "../../logger";
import { dedupeNames } from "../../shared/names";
import { Comhead, expectAck, parseInputNames, parseOutputNames, queryInstruction } from "./protocol";
import type { MatrixTransport } from "./transport";

const log = createLogger("discovery");

export interface DiscoveredNames {
  /** Noms des sorties, index 0 = sortie 1 (dé-dupliqués). */
  zones: string[];
  /** Noms des entrées, index 0 = entrée 1 (dé-dupliqués). */
  sources: string[];
}

/** Un nom vide garde sa position (l'index porte l'id) et prend le nom par défaut. */
function clean(prefix: "Output" | "Input", names: readonly string[]): string[] {
  return dedupeNames(names.map((n, i) => n.trim() || `${prefix}${i + 1}`));
}

/**
 * Lit une fois les noms affichés par la matrice (`get output status`, `get input status`).
 * Hors verrou: appelé au démarrage, avant toute commande.
 * @throws DeviceUnreachableError | DeviceError
 */
export async function discoverNames(transport: MatrixTransport, timeoutMs: number): Promise<DiscoveredNames> {
  const outInstr = queryInstruction(Comhead.getOutputStatus);
  const outReply = await transport.send(outInstr, timeoutMs);
  expectAck(outInstr, outReply);

  const inInstr = queryInstruction(Comhead.getInputStatus);
  const inReply = await transport.send(inInstr, timeoutMs);
  expectAck(inInstr, inReply);

  const names = { zones: clean("Output", parseOutputNames(outReply)), sources: clean("Input", parseInputNames(inReply)) };
  log.debug(`Noms lus: ${names.zones.length} sortie(s), ${names.sources.length} entrée(s)`);
  return names;
}
