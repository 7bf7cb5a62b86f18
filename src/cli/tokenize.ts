/**
 * Découpe une ligne de commande en arguments. Les guillemets simples ou doubles
 * regroupent un nom contenant des espaces: `route "Main TV" 'Xbox 360'`.
 * Un guillemet non refermé court jusqu'à la fin de la ligne.
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: '"' | "'" | null = null;
  let pending = false;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      pending = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (pending) tokens.push(current);
      current = "";
      pending = false;
      continue;
    }
    current += ch;
    pending = true;
  }
  if (pending) tokens.push(current);
  return tokens;
}
