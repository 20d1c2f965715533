export interface QuoteProvider {
  getQuote(): Promise<string>;
}

export const DEFAULT_QUOTE = '"Patience is bitter, but its fruit is sweet." - Jean-Jacques Rousseau';

const QUOTES = [
  DEFAULT_QUOTE,
  '"It does not matter how slowly you go as long as you do not stop." - Confucius',
  '"The best way out is always through." - Robert Frost',
  '"Keep your face always toward the sunshine, and shadows will fall behind you." - Walt Whitman',
  '"Act as if what you do makes a difference. It does." - William James'
];

// Picks from a fixed list; `random` is injectable for deterministic tests
export class StaticQuoteProvider implements QuoteProvider {
  constructor(
    private readonly quotes: readonly string[] = QUOTES,
    private readonly random: () => number = Math.random
  ) {}

  async getQuote(): Promise<string> {
    if (this.quotes.length === 0) return DEFAULT_QUOTE;
    const index = Math.min(Math.floor(this.random() * this.quotes.length), this.quotes.length - 1);
    return this.quotes[index];
  }
}
