import { Comhead, type Instruction, type Reply } from "../drivers/matrix/protocol";
import type { MatrixTransport } from "../drivers/matrix/transport";
import { MATRIX_PORTS } from "../types";

/** État d'une matrice simulée, au format des réponses JSON. */
export interface SimulatedDevice {
  power: 0 | 1;
  /** allsource[sortie-1] = entrée routée (1-based). */
  allsource: number[];
  name: string[];
  inname: string[];
}

export function simulatedDevice(init: Partial<SimulatedDevice> = {}): SimulatedDevice {
  return {
    power: 1,
    allsource: Array.from({ length: MATRIX_PORTS }, () => 1),
    name: Array.from({ length: MATRIX_PORTS }, (_, i) => `Output${i + 1}`),
    inname: Array.from({ length: MATRIX_PORTS }, (_, i) => `Input${i + 1}`),
    ...init,
  };
}

export type ReplyHandler = (instr: Instruction) => Reply | Promise<Reply>;

function pair(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [a, b] = value;
  return typeof a === "number" && typeof b === "number" ? [a, b] : null;
}

/** Comportement d'une matrice conforme au protocole JSON. */
export function deviceHandler(device: SimulatedDevice): ReplyHandler {
  return (instr) => {
    switch (instr.comhead) {
      case Comhead.videoSwitch: {
        const p = pair(instr.source);
        if (!p) return { comhead: "error" };
        const [source, zone] = p;
        device.allsource[zone - 1] = source;
        return { comhead: instr.comhead };
      }
      case Comhead.setPower:
        device.power = instr.power === 1 ? 1 : 0;
        return { comhead: instr.comhead };
      case Comhead.getStatus:
        return { comhead: instr.comhead, power: device.power };
      case Comhead.getOutputStatus:
        return { comhead: instr.comhead, allsource: [...device.allsource], name: [...device.name] };
      case Comhead.getInputStatus:
        return { comhead: instr.comhead, inname: [...device.inname] };
    }
  };
}

/**
 * Transport en mémoire: enregistre chaque instruction et délègue la réponse à `handler`.
 * `inFlight`/`maxInFlight` permettent de vérifier qu'aucun échange ne se chevauche.
 */
export class FakeMatrixTransport implements MatrixTransport {
  readonly sent: Instruction[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(public handler: ReplyHandler, readonly host = "10.0.0.9") {}

  async send(instr: Instruction, _timeoutMs: number): Promise<Reply> {
    this.sent.push(instr);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(instr);
    } finally {
      this.inFlight -= 1;
    }
  }

  comheads(): string[] {
    return this.sent.map((i) => i.comhead);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Laisse s'exécuter les micro‑tâches en attente. */
export async function flush(times = 50): Promise<void> {
  for (let i = 0; i < times; i++) await Promise.resolve();
}
