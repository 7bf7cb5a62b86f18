import { z } from "zod";
import { DeviceError } from "../../errors";
import { MATRIX_PORTS, type SourceId, type ZoneId } from "../../types";

/**
 * Protocole JSON de la matrice: `POST /cgi-bin/instr` avec `{ comhead, language, ...args }`.
 * Une réponse n'est un accusé valide que si elle renvoie le même `comhead`.
 */
export const Comhead = {
  videoSwitch: "video switch",
  setPower: "set poweronoff",
  getStatus: "get status",
  getOutputStatus: "get output status",
  getInputStatus: "get input status",
} as const;

export type Comhead = (typeof Comhead)[keyof typeof Comhead];

export interface Instruction {
  comhead: Comhead;
  language: 0;
  [arg: string]: unknown;
}

export type Reply = Record<string, unknown>;

export function switchInstruction(zone: ZoneId, source: SourceId): Instruction {
  // l'ordre est [entrée, sortie]
  return { comhead: Comhead.videoSwitch, language: 0, source: [source, zone] };
}

export function powerInstruction(on: boolean): Instruction {
  return { comhead: Comhead.setPower, language: 0, power: on ? 1 : 0 };
}

export function queryInstruction(comhead: typeof Comhead.getStatus | typeof Comhead.getOutputStatus | typeof Comhead.getInputStatus): Instruction {
  return { comhead, language: 0 };
}

export function isAck(instr: Instruction, reply: Reply): boolean {
  return reply.comhead === instr.comhead;
}

/** @throws DeviceError si la réponse n'accuse pas réception de `instr` */
export function expectAck(instr: Instruction, reply: Reply): void {
  if (!isAck(instr, reply)) {
    throw new DeviceError(`accusé '${String(reply.comhead)}' pour '${instr.comhead}'`, reply);
  }
}

const flag = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number), z.boolean().transform((b) => (b ? 1 : 0))]);

const statusReply = z.object({ power: flag }).passthrough();
const outputStatusReply = z.object({
  allsource: z.array(z.union([z.number(), z.string()])),
  name: z.array(z.string()).optional(),
}).passthrough();
const inputStatusReply = z.object({ inname: z.array(z.string()) }).passthrough();

function parse<S extends z.ZodTypeAny>(schema: S, reply: Reply, what: string): z.output<S> {
  const res = schema.safeParse(reply);
  if (!res.success) {
    const detail = res.error.issues.map((i) => `${i.path.join(".") || "(racine)"}: ${i.message}`).join("; ");
    throw new DeviceError(`${what} illisible (${detail})`, reply);
  }
  return res.data;
}

/** Lecture de `get status`: alimentation globale. */
export function parsePower(reply: Reply): boolean {
  return parse(statusReply, reply, Comhead.getStatus).power === 1;
}

/**
 * Lecture de `get output status`: `allsource[zone-1]` porte l'id (1-based) de l'entrée routée.
 * Une valeur hors 1..8 est traitée comme inconnue.
 */
export function parseOutputSources(reply: Reply): Map<ZoneId, SourceId | null> {
  const { allsource } = parse(outputStatusReply, reply, Comhead.getOutputStatus);
  const result = new Map<ZoneId, SourceId | null>();
  for (let zone = 1; zone <= MATRIX_PORTS; zone++) {
    const raw = allsource[zone - 1];
    const n = typeof raw === "string" ? Number(raw) : raw;
    result.set(zone, n !== undefined && Number.isInteger(n) && n >= 1 && n <= MATRIX_PORTS ? n : null);
  }
  return result;
}

/** Noms des sorties tels qu'affichés par la matrice (vide si absents). */
export function parseOutputNames(reply: Reply): string[] {
  return parse(outputStatusReply, reply, Comhead.getOutputStatus).name ?? [];
}

/** Noms des entrées tels qu'affichés par la matrice. */
export function parseInputNames(reply: Reply): string[] {
  return parse(inputStatusReply, reply, Comhead.getInputStatus).inname;
}
