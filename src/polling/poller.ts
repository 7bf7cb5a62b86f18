import { createLogger } from "../logger";
import type { DeviceFailure } from "../errors";
import type { DeviceState, Result } from "../types";

const log = createLogger("poller");

export interface PollingOptions {
  intervalMs: number;
  /** Plafond du délai entre deux ticks quand la matrice est injoignable. */
  maxBackoffMs: number;
  /** Nombre d'échecs consécutifs avant de déclarer la matrice indisponible. */
  unavailableAfter: number;
}

export const DEFAULT_POLLING: PollingOptions = {
  intervalMs: 10_000,
  maxBackoffMs: 60_000,
  unavailableAfter: 3,
};

/** Source d'état interrogée par le poller (le `ZoneRouter` en production). */
export interface PollTarget {
  refreshIfIdle(): Promise<Result<DeviceState, DeviceFailure> | null>;
  /** Commandes acquittées hors polling: la matrice répond, donc elle est disponible. */
  onCommandAck?(listener: () => void): () => void;
}

export type TickOutcome = "ok" | "skipped" | "unreachable" | "error";
export type AvailabilityListener = (available: boolean) => void;

/**
 * Rafraîchit l'état de la matrice à intervalle fixe (chaîne de `setTimeout`, pas
 * de `setInterval`: un tick ne démarre jamais avant la fin du précédent).
 *
 * - Tick sauté si une commande est en cours: ni succès ni échec
 * - Injoignable: backoff `min(maxBackoffMs, intervalMs * 2^n)`
 * - `unavailableAfter` échecs consécutifs → indisponible; le succès suivant
 *   (tick ou commande acquittée) rétablit
 */
export class StatusPoller {
  private options: PollingOptions;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private generation = 0;
  private failures = 0;
  private unreachableStreak = 0;
  private available = true;
  private readonly listeners = new Set<AvailabilityListener>();

  constructor(private readonly target: PollTarget, options: Partial<PollingOptions> = {}) {
    this.options = { ...DEFAULT_POLLING, ...options };
    target.onCommandAck?.(() => this.recordSuccess());
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isAvailable(): boolean {
    return this.available;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /** Délai avant le prochain tick, backoff inclus. */
  get nextDelayMs(): number {
    const { intervalMs, maxBackoffMs } = this.options;
    if (this.unreachableStreak === 0) return intervalMs;
    return Math.min(maxBackoffMs, intervalMs * 2 ** this.unreachableStreak);
  }

  /** Démarre le polling; le premier tick part immédiatement. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation += 1;
    log.debug(`Polling démarré (intervalle ${this.options.intervalMs}ms)`);
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Applique de nouveaux réglages (hot reload); pris en compte au prochain tick. */
  updateOptions(options: Partial<PollingOptions>): void {
    this.options = { ...this.options, ...options };
  }

  /**
   * @returns Fonction pour se désabonner
   */
  onAvailabilityChange(listener: AvailabilityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Un tick de polling (public pour la commande CLI `refresh` et les tests). */
  async tick(): Promise<TickOutcome> {
    const res = await this.target.refreshIfIdle();
    if (res === null) {
      log.trace("Tick sauté: commande en cours");
      return "skipped";
    }
    if (res.ok) {
      this.recordSuccess();
      return "ok";
    }

    this.failures += 1;
    if (res.error.kind === "DeviceUnreachable") {
      this.unreachableStreak += 1;
    } else {
      this.unreachableStreak = 0;
    }
    log.warn(`Polling en échec (${this.failures}): ${res.error.message}`);
    if (this.failures >= this.options.unavailableAfter) this.setAvailable(false);
    return res.error.kind === "DeviceUnreachable" ? "unreachable" : "error";
  }

  private schedule(delayMs: number): void {
    // un tick en vol après stop()/start() ne doit pas relancer une seconde chaîne
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick()
        .catch((err: unknown) => {
          log.error("Tick de polling interrompu:", err);
        })
        .finally(() => {
          if (this.running && generation === this.generation) this.schedule(this.nextDelayMs);
        });
    }, delayMs);
  }

  private recordSuccess(): void {
    this.failures = 0;
    this.unreachableStreak = 0;
    this.setAvailable(true);
  }

  private setAvailable(available: boolean): void {
    if (this.available === available) return;
    this.available = available;
    if (available) log.info("Matrice de nouveau disponible");
    else log.warn(`Matrice indisponible après ${this.failures} échec(s) consécutif(s)`);
    for (const fn of this.listeners) {
      try { fn(available); } catch (err) { log.warn("Listener disponibilité en erreur:", err); }
    }
  }
}
