import { DEFAULT_QUOTE, StaticQuoteProvider } from '../services/quoteProvider';

describe('StaticQuoteProvider', () => {
  test('picks the quote the random source points at', async () => {
    const provider = new StaticQuoteProvider(['first', 'second', 'third'], () => 0.5);
    await expect(provider.getQuote()).resolves.toBe('second');
  });

  test('a random value of 1 stays inside the list', async () => {
    const provider = new StaticQuoteProvider(['first', 'second'], () => 1);
    await expect(provider.getQuote()).resolves.toBe('second');
  });

  test('empty list falls back to the default quote', async () => {
    await expect(new StaticQuoteProvider([]).getQuote()).resolves.toBe(DEFAULT_QUOTE);
  });
});
