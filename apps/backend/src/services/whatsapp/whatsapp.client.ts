import axios, { AxiosInstance } from 'axios';
import { Messenger } from '../../interfaces/messaging.interfaces';
import { DeliveryResult, ReplyButton } from '../../types';
import { errorMessage } from '../../utils/errors';
import { formatPhoneNumber } from '../../utils';
import defaultLogger, { Logger } from '../../utils/logger';

export const MAX_BUTTONS = 3;
export const MAX_BUTTON_TITLE_LENGTH = 20;
export const MAX_BODY_LENGTH = 1024;

export interface WhatsAppClientConfig {
  apiBaseUrl: string;
  phoneNumberId: string;
  apiToken: string;
  timeoutMs: number;
  defaultCountryCode: string;
}

interface SendMessageResponse {
  messages?: Array<{ id: string }>;
}

/** Messenger backed by the WhatsApp Cloud API. */
export class WhatsAppClient implements Messenger {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: WhatsAppClientConfig,
    http?: AxiosInstance,
    private readonly logger: Logger = defaultLogger
  ) {
    this.http = http ?? axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Authorization': `Bearer ${config.apiToken}`,
        'Content-Type': 'application/json'
      }
    });
  }

  async sendText(to: string, body: string): Promise<DeliveryResult> {
    return await this.send(to, 'text', {
      text: { body: body.slice(0, 4096), preview_url: true }
    });
  }

  async sendImage(to: string, url: string, caption?: string): Promise<DeliveryResult> {
    return await this.send(to, 'image', {
      image: caption ? { link: url, caption: caption.slice(0, MAX_BODY_LENGTH) } : { link: url }
    });
  }

  async sendButtons(to: string, body: string, buttons: ReplyButton[]): Promise<DeliveryResult> {
    return await this.send(to, 'interactive', {
      interactive: {
        type: 'button',
        body: { text: body.slice(0, MAX_BODY_LENGTH) },
        action: {
          buttons: buttons.slice(0, MAX_BUTTONS).map((button) => ({
            type: 'reply',
            reply: { id: button.id, title: button.title.slice(0, MAX_BUTTON_TITLE_LENGTH) }
          }))
        }
      }
    });
  }

  private async send(to: string, type: string, content: Record<string, unknown>): Promise<DeliveryResult> {
    if (!this.config.apiToken || !this.config.phoneNumberId) {
      return { success: false, error: 'WhatsApp API is not configured' };
    }

    const recipient = formatPhoneNumber(to, this.config.defaultCountryCode);

    try {
      const response = await this.http.post<SendMessageResponse>(
        `/${this.config.phoneNumberId}/messages`,
        {
          messaging_product: 'whatsapp',
          recipient_type: 'individual',
          to: recipient,
          type,
          ...content
        }
      );

      return { success: true, messageId: response.data.messages?.[0]?.id };
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? `${error.response?.status ?? 'no response'} ${error.message}`
        : errorMessage(error);
      this.logger.warn(`WhatsApp ${type} message to ${recipient} failed: ${detail}`);
      return { success: false, error: `Failed to send WhatsApp message: ${detail}` };
    }
  }
}
