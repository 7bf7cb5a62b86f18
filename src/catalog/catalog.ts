import { CatalogError } from "../errors";
import { MATRIX_PORTS, type NamedPort, type SourceId, type ZoneId } from "../types";
import { defaultNames } from "../shared/names";

export type PortKind = "zone" | "source";

/**
 * Table de correspondance bidirectionnelle id ↔ nom, construite une seule fois
 * au démarrage puis figée. Recherche par nom exacte (sensible à la casse).
 */
export class NameTable {
  private readonly byName: ReadonlyMap<string, number>;
  private readonly byId: ReadonlyMap<number, string>;
  private readonly ports: readonly NamedPort[];

  private constructor(readonly kind: PortKind, ports: NamedPort[]) {
    const sorted = [...ports].sort((a, b) => a.id - b.id).map((p) => Object.freeze({ id: p.id, name: p.name }));
    this.ports = Object.freeze(sorted);
    this.byName = new Map(sorted.map((p) => [p.name, p.id]));
    this.byId = new Map(sorted.map((p) => [p.id, p.name]));
    Object.freeze(this);
  }

  /**
   * Valide puis construit une table.
   * @throws CatalogError si un id est hors 1..8 ou dupliqué, ou si un nom est vide ou dupliqué
   */
  static from(kind: PortKind, entries: Iterable<readonly [number, string]>): NameTable {
    const ports: NamedPort[] = [];
    const ids = new Set<number>();
    const names = new Set<string>();
    for (const [id, name] of entries) {
      if (!Number.isInteger(id) || id < 1 || id > MATRIX_PORTS) {
        throw new CatalogError(`${kind}: id ${String(id)} hors plage 1..${MATRIX_PORTS}`);
      }
      if (ids.has(id)) throw new CatalogError(`${kind}: id ${id} défini plusieurs fois`);
      if (name.trim().length === 0) throw new CatalogError(`${kind} ${id}: nom vide`);
      if (names.has(name)) throw new CatalogError(`${kind}: nom '${name}' utilisé plusieurs fois`);
      ids.add(id);
      names.add(name);
      ports.push({ id, name });
    }
    return new NameTable(kind, ports);
  }

  /** Table à partir d'une liste ordonnée: l'index 0 devient l'id 1. */
  static fromList(kind: PortKind, names: readonly string[]): NameTable {
    return NameTable.from(kind, names.slice(0, MATRIX_PORTS).map((name, i) => [i + 1, name] as const));
  }

  idOf(name: string): number | undefined {
    return this.byName.get(name);
  }

  nameOf(id: number): string | undefined {
    return this.byId.get(id);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  list(): readonly NamedPort[] {
    return this.ports;
  }

  names(): string[] {
    return this.ports.map((p) => p.name);
  }

  get size(): number {
    return this.ports.length;
  }
}

/** Tables zones + sources d'une matrice, immuables après construction. */
export interface MatrixCatalog {
  readonly zones: NameTable;
  readonly sources: NameTable;
}

export interface CatalogInput {
  /** Zones configurées (id → nom). Absent: noms par défaut Output1..Output8. */
  zones?: ReadonlyMap<ZoneId, string> | null;
  /** Sources configurées (id → nom). Absent: noms par défaut Input1..Input8. */
  sources?: ReadonlyMap<SourceId, string> | null;
}

export function buildCatalog(input: CatalogInput): MatrixCatalog {
  const zones = input.zones
    ? NameTable.from("zone", input.zones.entries())
    : NameTable.fromList("zone", defaultNames("Output", MATRIX_PORTS));
  const sources = input.sources
    ? NameTable.from("source", input.sources.entries())
    : NameTable.fromList("source", defaultNames("Input", MATRIX_PORTS));
  return Object.freeze({ zones, sources });
}
