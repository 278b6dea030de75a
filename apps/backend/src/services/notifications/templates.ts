import { OutboundMessage, ReplyButton } from '../../types';
import { formatPrice } from '../../utils';

export const CONFIRM_ADD_PREFIX = 'confirm_add_';
export const CANCEL_ADD_PREFIX = 'cancel_add_';

export interface ProductSummary {
  id: string;
  name: string;
  price?: number;
  currency: string;
  imageUrl: string;
}

function describeProduct(product: Pick<ProductSummary, 'name' | 'price' | 'currency'>): string {
  if (product.price === undefined) {
    return `*${product.name}*`;
  }
  return `*${product.name}* - ${formatPrice(product.price, product.currency)}`;
}

export function welcome(to: string, catalogUrl: string, name?: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: `👋 Welcome to Stallbook, ${name ?? 'there'}!\n\nYour catalog is ready: ${catalogUrl}\n\n` +
      'Send a photo of a product with its name and price as the caption (e.g. "Red Shoes $45.99") to add it.'
  };
}

export function welcomeBack(to: string, catalogUrl: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: `Welcome back! 👋\n\nYour catalog: ${catalogUrl}\n\nSend a product photo any time to add it.`
  };
}

export function helpGuide(to: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: '📖 *How Stallbook works*\n\n' +
      '1. Send a product photo with a caption like "Red Shoes $45.99"\n' +
      '2. Tap ✅ Add to publish it or ❌ Cancel to discard it\n' +
      '3. Send "link" to get your catalog link to share with buyers\n\n' +
      'Send "hi" to get started.'
  };
}

export function catalogLink(to: string, catalogUrl: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: `🔗 Your catalog link:\n${catalogUrl}\n\nShare it with your buyers!`
  };
}

export function notRegistered(to: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: 'You don\'t have a catalog yet. Send "hi" or a product photo to create one.'
  };
}

export function fallbackGuidance(to: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: 'I didn\'t quite get that. Send a product photo to add it, "link" for your catalog link, or "help" for a guide.'
  };
}

export function uploadPrompt(to: string, product: ProductSummary): OutboundMessage {
  const buttons: ReplyButton[] = [
    { id: `${CONFIRM_ADD_PREFIX}${product.id}`, title: '✅ Add' },
    { id: `${CANCEL_ADD_PREFIX}${product.id}`, title: '❌ Cancel' }
  ];

  return {
    kind: 'buttons',
    to,
    body: `📦 New product: ${describeProduct(product)}\n\nAdd it to your catalog?`,
    buttons
  };
}

export function productAdded(to: string, product: ProductSummary, catalogUrl: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: `✅ ${describeProduct(product)} is now in your catalog.\n\n${catalogUrl}`
  };
}

export function productCancelled(to: string): OutboundMessage {
  return { kind: 'text', to, body: '❌ Upload cancelled. Nothing was added.' };
}

export function alreadyHandled(to: string): OutboundMessage {
  return { kind: 'text', to, body: 'This product was already handled.' };
}

export function notFound(to: string): OutboundMessage {
  return { kind: 'text', to, body: 'Sorry, I couldn\'t find that product.' };
}

export function invalidImage(to: string, reason: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: `⚠️ That image can't be used: ${reason}\n\nPlease send a JPEG, PNG or WebP photo.`
  };
}

export function downloadFailed(to: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: '⚠️ I couldn\'t download your photo. Please try sending it again.'
  };
}

export function genericFailure(to: string): OutboundMessage {
  return {
    kind: 'text',
    to,
    body: 'Something went wrong on our side. Please try again in a moment.'
  };
}

export function interestNotification(
  to: string,
  product: Pick<ProductSummary, 'name' | 'price' | 'currency'>,
  buyer: { name?: string; phone?: string }
): OutboundMessage {
  const who = buyer.name ?? 'A buyer';
  const contact = buyer.phone ? `\nContact: ${buyer.phone}` : '';

  return {
    kind: 'text',
    to,
    body: `🛍️ ${who} is interested in ${describeProduct(product)}.${contact}`
  };
}
