/** Labels that introduce a venue in free text, most specific first. */
export const LOCATION_LABELS = ["Veranstaltungsort", "Spielort", "Location", "Adresse", "Ort", "Wo"] as const;

export const CATEGORY_LABELS = ["Kategorie", "Rubrik", "Sparte", "Genre"] as const;

export const PRICE_LABELS = ["Eintritt", "Preis", "Preise", "Tickets", "Karten", "VVK"] as const;

const MAX_VALUE_LENGTH = 150;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Find `Label: value` in text, the value running to the end of the line.
 * Labels are tried in order; values shorter than `minLength` are skipped.
 */
export function findLabeledValue(
  text: string,
  labels: readonly string[],
  minLength = 3
): string | null {
  for (const label of labels) {
    const re = new RegExp(`(?<!\\p{L})${escapeRegExp(label)}\\s*:[ \\t]*([^\\n\\r]+)`, "giu");
    for (const m of text.matchAll(re)) {
      const value = (m[1] ?? "").replace(/\s+/g, " ").trim();
      if (value.length >= minLength) return value.slice(0, MAX_VALUE_LENGTH);
    }
  }
  return null;
}
