import { roundPrice } from '../../utils';

export const UNTITLED_PRODUCT = 'Untitled Product';
export const MAX_NAME_WITHOUT_PRICE = 50;
// Width of listings.name
export const MAX_NAME_LENGTH = 200;

const PRICE_PATTERN = /([$£€])?(\d+(?:\.\d{2})?)/;
const TRAILING_SEPARATORS = /[\s\-–—:]+$/;

const CURRENCY_BY_SYMBOL: Record<string, string> = {
  '$': 'USD',
  '£': 'GBP',
  '€': 'EUR'
};

export interface ParsedCaption {
  name: string;
  price?: number;
  currency: string;
  description?: string;
}

/**
 * Extracts a product name and optional price from a free-form caption such
 * as "Red Shoes $45.99". The first number found is the price; whatever
 * precedes it is the name.
 */
export function parseCaption(caption: string | undefined, defaultCurrency: string): ParsedCaption {
  const text = caption?.trim() ?? '';

  if (text.length === 0) {
    return { name: UNTITLED_PRODUCT, currency: defaultCurrency };
  }

  const match = PRICE_PATTERN.exec(text);

  if (!match) {
    return {
      name: text.slice(0, MAX_NAME_WITHOUT_PRICE),
      currency: defaultCurrency,
      description: caption
    };
  }

  const [, symbol, amount] = match;
  const name = text.slice(0, match.index).replace(TRAILING_SEPARATORS, '').trim().slice(0, MAX_NAME_LENGTH).trimEnd();

  return {
    name: name.length > 0 ? name : UNTITLED_PRODUCT,
    price: roundPrice(parseFloat(amount)),
    currency: symbol ? CURRENCY_BY_SYMBOL[symbol] : defaultCurrency,
    description: caption
  };
}
