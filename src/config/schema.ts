import { z } from "zod";
import { parseLogLevel } from "../logger";
import { MATRIX_PORTS } from "../types";

const portId = z
  .string()
  .regex(/^\d+$/, "id entier attendu")
  .refine((k) => Number(k) >= 1 && Number(k) <= MATRIX_PORTS, `id hors plage 1..${MATRIX_PORTS}`);

const namedPort = z.object({ name: z.string().trim().min(1, "nom vide") }).strict();

/** Table `id → { name }` (les clés YAML numériques arrivent en chaînes). */
const portTable = z.record(portId, namedPort);

const logLevel = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (level === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `niveau de log inconnu '${value}'` });
    return z.NEVER;
  }
  return level;
});

export const matrixSchema = z
  .object({
    host: z.string().trim().min(1).default("127.0.0.1"),
    port: z.number().int().min(1).max(65535).optional(),
    timeout_ms: z.number().int().positive().default(3000),
    power_settle_ms: z.number().int().min(0).default(2000),
    wake_on_route: z.boolean().default(false),
  })
  .strict();

export const pollingSchema = z
  .object({
    interval_ms: z.number().int().positive().default(10_000),
    max_backoff_ms: z.number().int().positive().default(60_000),
    unavailable_after: z.number().int().positive().default(3),
  })
  .strict()
  .refine((p) => p.max_backoff_ms >= p.interval_ms, {
    message: "max_backoff_ms doit être ≥ interval_ms",
    path: ["max_backoff_ms"],
  });

/** Fichier `config.yaml` tel qu'écrit par l'utilisateur. */
export const configFileSchema = z
  .object({
    matrix: matrixSchema.default({}),
    polling: pollingSchema.default({}),
    names_from_device: z.boolean().default(false),
    zones: portTable.optional(),
    sources: portTable.optional(),
    log_level: logLevel.optional(),
  })
  .strict();

export type ConfigFile = z.output<typeof configFileSchema>;
