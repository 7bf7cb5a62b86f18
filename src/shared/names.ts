/**
 * Dé-duplique une liste de noms en suffixant les répétitions: `_1`, `_2`, …
 * La première occurrence garde son nom. Retourne une nouvelle liste.
 *
 * Ex: ["HDMI", "HDMI", "PC", "HDMI"] → ["HDMI", "HDMI_1", "PC", "HDMI_2"]
 */
export function dedupeNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set(names);
  const out: string[] = [];
  for (const name of names) {
    const count = seen.get(name);
    if (count === undefined) {
      seen.set(name, 0);
      out.push(name);
      continue;
    }
    let n = count + 1;
    // un nom suffixé peut déjà exister tel quel dans la liste d'origine
    while (taken.has(`${name}_${n}`)) n += 1;
    seen.set(name, n);
    const unique = `${name}_${n}`;
    taken.add(unique);
    out.push(unique);
  }
  return out;
}

/** Noms par défaut `Output1..OutputN` / `Input1..InputN`. */
export function defaultNames(prefix: "Output" | "Input", count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

/** Identifiant d'entité: minuscules, [a-z0-9_], sans `_` en tête/fin. */
export function slugify(text: string): string {
  const slug = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug.length > 0 ? slug : "unnamed";
}
