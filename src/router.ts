import { createLogger } from "./logger";
import type { MatrixCatalog } from "./catalog/catalog";
import type { MatrixTransport } from "./drivers/matrix/transport";
import {
  Comhead,
  expectAck,
  parseOutputSources,
  parsePower,
  powerInstruction,
  queryInstruction,
  switchInstruction,
} from "./drivers/matrix/protocol";
import {
  UnknownSourceError,
  UnknownZoneError,
  isDeviceFailure,
  type DeviceFailure,
  type RouteError,
} from "./errors";
import { CommandLock } from "./shared/commandLock";
import { DeviceStateStore } from "./state";
import { err, ok, type DeviceState, type Result } from "./types";

const log = createLogger("router");

export const DEFAULT_TIMEOUT_MS = 3000;
export const DEFAULT_POWER_SETTLE_MS = 2000;

export interface ZoneRouterOptions {
  catalog: MatrixCatalog;
  transport: MatrixTransport;
  state?: DeviceStateStore;
  lock?: CommandLock;
  /** Délai maximal par échange avec la matrice. */
  timeoutMs?: number;
  /** Pause (verrou tenu) après une commande d'alimentation. */
  powerSettleMs?: number;
  /** Allumer la matrice le temps d'un routage si elle est connue éteinte. */
  wakeOnRoute?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Routeur zones/sources: traduit une demande nommée (« zone Z sur source S »)
 * en commande matrice, et les lectures d'état en état connu.
 *
 * Invariants clés:
 * - Un seul échange avec la matrice à la fois (`CommandLock`, FIFO)
 * - Un nom inconnu ne contacte jamais la matrice
 * - Un échec laisse l'état connu intact
 */
export class ZoneRouter {
  readonly catalog: MatrixCatalog;
  readonly state: DeviceStateStore;
  private readonly transport: MatrixTransport;
  private readonly lock: CommandLock;
  private readonly timeoutMs: number;
  private readonly powerSettleMs: number;
  private readonly wakeOnRoute: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly ackListeners = new Set<() => void>();

  constructor(options: ZoneRouterOptions) {
    this.catalog = options.catalog;
    this.transport = options.transport;
    this.state = options.state ?? new DeviceStateStore();
    this.lock = options.lock ?? new CommandLock();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.powerSettleMs = options.powerSettleMs ?? DEFAULT_POWER_SETTLE_MS;
    this.wakeOnRoute = options.wakeOnRoute ?? false;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get host(): string {
    return this.transport.host;
  }

  /** true si une commande ou une lecture est en cours ou en attente. */
  get busy(): boolean {
    return this.lock.busy;
  }

  /**
   * Route la source `sourceName` vers la zone `zoneName` (noms exacts, sensibles à la casse).
   * En cas de succès, l'état connu de la zone devient la source demandée.
   */
  async route(zoneName: string, sourceName: string): Promise<Result<void, RouteError>> {
    const zone = this.catalog.zones.idOf(zoneName);
    if (zone === undefined) {
      log.warn(`Zone inconnue: '${zoneName}'`);
      return err(new UnknownZoneError(zoneName));
    }
    const source = this.catalog.sources.idOf(sourceName);
    if (source === undefined) {
      log.warn(`Source inconnue: '${sourceName}'`);
      return err(new UnknownSourceError(sourceName));
    }

    const res = await this.exclusive(`route '${zoneName}' ← '${sourceName}'`, async () => {
      const wake = this.wakeOnRoute && this.state.getPower() === false;
      if (wake) {
        log.info("Matrice éteinte: allumage le temps du routage");
        await this.sendPower(true);
      }
      try {
        const instr = switchInstruction(zone, source);
        expectAck(instr, await this.transport.send(instr, this.timeoutMs));
        this.state.applyRoute(zone, source);
      } finally {
        if (wake) await this.restorePowerOff();
      }
    });
    if (res.ok) {
      log.info(`Zone '${zoneName}' (sortie ${zone}) → '${sourceName}' (entrée ${source})`);
      this.notifyAck();
    }
    return res;
  }

  /** Lit l'alimentation et l'affectation de chaque zone, met à jour l'état connu. */
  queryState(): Promise<Result<DeviceState, DeviceFailure>> {
    return this.exclusive("lecture d'état", () => this.readStatus());
  }

  /**
   * Lecture d'état pour le polling: retourne null sans contacter la matrice si
   * une commande est en cours ou en attente.
   */
  async refreshIfIdle(): Promise<Result<DeviceState, DeviceFailure> | null> {
    const run = this.lock.tryRun(() => this.readStatus());
    if (!run) return null;
    try {
      return ok(await run);
    } catch (e) {
      if (isDeviceFailure(e)) return err(e);
      throw e;
    }
  }

  /** Allume/éteint la matrice (alimentation globale, pas par zone). */
  async setPower(on: boolean): Promise<Result<void, DeviceFailure>> {
    const res = await this.exclusive(`alimentation ${on ? "ON" : "OFF"}`, () => this.sendPower(on));
    if (res.ok) {
      log.info(`Matrice ${on ? "allumée" : "éteinte"}`);
      this.notifyAck();
    }
    return res;
  }

  /** État connu (copie), sans contacter la matrice. */
  getState(): DeviceState {
    return this.state.snapshot();
  }

  /** Nom de la source actuellement routée vers `zoneName`, ou null si inconnue. */
  zoneSourceName(zoneName: string): string | null {
    const zone = this.catalog.zones.idOf(zoneName);
    if (zone === undefined) return null;
    const source = this.state.getSource(zone);
    if (source === null) return null;
    return this.catalog.sources.nameOf(source) ?? null;
  }

  /**
   * Notifié après chaque commande acquittée par la matrice (routage, alimentation).
   * @returns Fonction pour se désabonner
   */
  onCommandAck(listener: () => void): () => void {
    this.ackListeners.add(listener);
    return () => {
      this.ackListeners.delete(listener);
    };
  }

  /** Refuse les nouvelles commandes et attend la fin de l'échange en cours. */
  async shutdown(): Promise<void> {
    await this.lock.close();
  }

  private async exclusive<T>(label: string, task: () => Promise<T>): Promise<Result<T, DeviceFailure>> {
    try {
      return ok(await this.lock.run(task));
    } catch (e) {
      if (isDeviceFailure(e)) {
        log.warn(`${label}: ${e.message}`);
        return err(e);
      }
      throw e;
    }
  }

  private async readStatus(): Promise<DeviceState> {
    const statusInstr = queryInstruction(Comhead.getStatus);
    const status = await this.transport.send(statusInstr, this.timeoutMs);
    expectAck(statusInstr, status);
    const power = parsePower(status);

    const outputInstr = queryInstruction(Comhead.getOutputStatus);
    const outputs = await this.transport.send(outputInstr, this.timeoutMs);
    expectAck(outputInstr, outputs);
    const sources = parseOutputSources(outputs);

    this.state.applyStatus(power, sources);
    log.debug(`État lu: power=${power ? "ON" : "OFF"}`);
    return this.state.snapshot();
  }

  private async sendPower(on: boolean): Promise<void> {
    const instr = powerInstruction(on);
    expectAck(instr, await this.transport.send(instr, this.timeoutMs));
    this.state.applyPower(on);
    if (this.powerSettleMs > 0) await this.sleep(this.powerSettleMs);
  }

  private notifyAck(): void {
    for (const fn of this.ackListeners) {
      try { fn(); } catch (e) { log.warn("Listener d'acquittement en erreur:", e); }
    }
  }

  private async restorePowerOff(): Promise<void> {
    try {
      await this.sendPower(false);
    } catch (e) {
      // le résultat du routage prime sur celui de la remise hors tension
      if (!isDeviceFailure(e)) throw e;
      log.warn(`Remise hors tension après routage échouée: ${e.message}`);
    }
  }
}
