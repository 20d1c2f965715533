// Capitalize the first letter of every run of letters (any script), lowercase the rest
// ("mercedes-benz" -> "Mercedes-Benz", "BMW" -> "Bmw", "citroën" -> "Citroën")
export function titleCase(input: string): string {
  return input.replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

// True when any keyword occurs as a substring of the (already lowercased) text
export function includesAny(lower: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => lower.includes(keyword));
}
