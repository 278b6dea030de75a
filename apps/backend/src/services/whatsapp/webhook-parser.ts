import { z } from 'zod';
import { InboundEvent } from '../../types';

const replySchema = z.object({
  id: z.string(),
  title: z.string().optional()
});

const messageSchema = z.object({
  id: z.string().optional(),
  from: z.string().min(1),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  image: z
    .object({
      id: z.string().optional(),
      caption: z.string().optional(),
      mime_type: z.string().optional()
    })
    .optional(),
  interactive: z
    .object({
      type: z.string().optional(),
      button_reply: replySchema.optional(),
      list_reply: replySchema.optional()
    })
    .optional()
});

export const webhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        id: z.string().optional(),
        changes: z
          .array(
            z.object({
              field: z.string().optional(),
              value: z
                .object({
                  messages: z.array(messageSchema).optional(),
                  statuses: z.array(z.unknown()).optional()
                })
                .passthrough()
            })
          )
          .default([])
      })
    )
    .default([])
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;
type WebhookMessage = z.infer<typeof messageSchema>;

/**
 * Extracts the first message of a Cloud API webhook delivery. Status
 * updates, malformed bodies and unsupported message types yield null.
 */
export function parseWebhookPayload(payload: unknown): InboundEvent | null {
  const parsed = webhookPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const message = parsed.data.entry[0]?.changes[0]?.value.messages?.[0];
  if (!message) {
    return null;
  }

  return toInboundEvent(message);
}

function toInboundEvent(message: WebhookMessage): InboundEvent | null {
  const { from, id: messageId } = message;

  switch (message.type) {
    case 'text':
      return { type: 'text', from, body: message.text?.body ?? '', messageId };
    case 'image':
      return {
        type: 'image',
        from,
        mediaRef: message.image?.id ?? '',
        caption: message.image?.caption,
        messageId
      };
    case 'interactive': {
      const reply = message.interactive?.button_reply ?? message.interactive?.list_reply;
      return reply ? { type: 'button_tap', from, buttonId: reply.id, messageId } : null;
    }
    default:
      return null;
  }
}
