import { DeviceError, DeviceUnreachableError, errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import type { Instruction, Reply } from "./protocol";

const log = createLogger("transport");

/**
 * Échange requête/réponse avec la matrice. Une implémentation ne sérialise pas
 * les appels: l'exclusion mutuelle est assurée par le `ZoneRouter`.
 */
export interface MatrixTransport {
  /** Adresse affichable de la matrice (logs, identifiants d'entités). */
  readonly host: string;
  /**
   * Envoie une instruction et retourne la réponse JSON (objet).
   * @throws DeviceUnreachableError connexion impossible ou délai `timeoutMs` dépassé
   * @throws DeviceError statut HTTP en échec ou corps illisible
   */
  send(instr: Instruction, timeoutMs: number): Promise<Reply>;
}

export interface HttpTransportOptions {
  host: string;
  port?: number;
  /** Chemin de l'API d'instructions. Défaut: /cgi-bin/instr */
  path?: string;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function isReply(value: unknown): value is Reply {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Transport HTTP/JSON (une connexion par requête). */
export class HttpMatrixTransport implements MatrixTransport {
  readonly host: string;
  private readonly url: string;

  constructor(options: HttpTransportOptions) {
    this.host = options.port ? `${options.host}:${options.port}` : options.host;
    this.url = `http://${this.host}${options.path ?? "/cgi-bin/instr"}`;
  }

  async send(instr: Instruction, timeoutMs: number): Promise<Reply> {
    const body = JSON.stringify(instr);
    log.trace(`→ ${this.url} ${body}`);
    const signal = AbortSignal.timeout(timeoutMs);

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json; charset=utf-8" },
        body,
        signal,
      });
    } catch (err) {
      const reason = isAbort(err) ? `pas de réponse après ${timeoutMs}ms` : errorMessage(err);
      throw new DeviceUnreachableError(this.host, reason, { cause: err });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      if (isAbort(err)) throw new DeviceUnreachableError(this.host, `réponse incomplète après ${timeoutMs}ms`, { cause: err });
      throw new DeviceError(`lecture du corps impossible: ${errorMessage(err)}`, undefined, { cause: err });
    }
    log.trace(`← ${res.status} ${text}`);

    if (!res.ok) {
      throw new DeviceError(`HTTP ${res.status} pour '${instr.comhead}'`, text);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new DeviceError(`JSON illisible pour '${instr.comhead}'`, text, { cause: err });
    }
    if (!isReply(parsed)) {
      throw new DeviceError(`objet JSON attendu pour '${instr.comhead}'`, parsed);
    }
    return parsed;
  }
}
