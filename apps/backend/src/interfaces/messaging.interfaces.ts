import { DeliveryResult, ReplyButton } from '../types';

/** Outbound delivery to a chat participant. */
export interface Messenger {
  sendText(to: string, body: string): Promise<DeliveryResult>;
  sendImage(to: string, url: string, caption?: string): Promise<DeliveryResult>;
  sendButtons(to: string, body: string, buttons: ReplyButton[]): Promise<DeliveryResult>;
}

export interface DownloadedMedia {
  data: Buffer;
  contentType: string;
  size: number;
}

export interface MediaResolver {
  /** Null when the platform does not know the media id. */
  resolveMediaUrl(mediaId: string): Promise<string | null>;
  download(url: string): Promise<DownloadedMedia>;
}

export interface StoredImage {
  url: string;
  path: string;
}

export interface ImageStore {
  save(data: Buffer, contentType: string): Promise<StoredImage>;
  delete(path: string): Promise<void>;
}
