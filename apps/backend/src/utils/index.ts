import { randomInt } from 'crypto';

// Constants
export const SECOND_IN_MS = 1000;
export const HOUR_IN_MS = 60 * 60 * 1000;

export const SLUG_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
export const SLUG_LENGTH = 8;

// Slugs are drawn from a cryptographically strong source
export function generateCatalogSlug(): string {
  let slug = '';

  for (let i = 0; i < SLUG_LENGTH; i++) {
    slug += SLUG_ALPHABET.charAt(randomInt(SLUG_ALPHABET.length));
  }

  return slug;
}

// Round to two decimal places, the precision prices are stored with
export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatPrice(price: number, currency: string): string {
  const symbols: Record<string, string> = { USD: '$', GBP: '£', EUR: '€' };
  const symbol = symbols[currency];
  return symbol ? `${symbol}${price.toFixed(2)}` : `${price.toFixed(2)} ${currency}`;
}

/**
 * Strip everything but digits; a bare 10-digit national number gets the
 * default country code.
 */
export function formatPhoneNumber(phone: string, defaultCountryCode: string = '1'): string {
  let digits = phone.includes('@') ? phone.split('@')[0] : phone;
  digits = digits.replace(/\D/g, '');

  if (digits.length === 10) {
    digits = defaultCountryCode + digits;
  }

  return digits;
}

export function buildDeepLink(phoneNumber: string, text?: string, defaultCountryCode: string = '1'): string {
  const digits = formatPhoneNumber(phoneNumber, defaultCountryCode);

  if (text) {
    return `https://wa.me/${digits}?text=${encodeURIComponent(text)}`;
  }

  return `https://wa.me/${digits}`;
}

export function buildInterestMessage(productName: string, price?: number, currency: string = 'USD'): string {
  let message = `Hi! I'm interested in your product: ${productName}`;
  if (price !== undefined) {
    message += ` (priced at ${formatPrice(price, currency)})`;
  }
  return `${message}. Is it still available?`;
}

export function buildCatalogUrl(baseUrl: string, catalogSlug: string): string {
  return `${baseUrl.replace(/\/$/, '')}/${catalogSlug}`;
}
