import axios, { AxiosInstance } from 'axios';
import { DownloadedMedia, MediaResolver } from '../../interfaces/messaging.interfaces';
import { PayloadTooLargeError, UpstreamFailureError, errorMessage } from '../../utils/errors';
import defaultLogger, { Logger } from '../../utils/logger';

export interface MediaClientConfig {
  apiBaseUrl: string;
  apiToken: string;
  timeoutMs: number;
  maxContentLength: number;
}

interface MediaInfoResponse {
  url?: string;
  mime_type?: string;
  file_size?: number;
}

/** Resolves Graph API media ids and downloads the files they point to. */
export class GraphMediaClient implements MediaResolver {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: MediaClientConfig,
    http?: AxiosInstance,
    private readonly logger: Logger = defaultLogger
  ) {
    this.http = http ?? axios.create({ timeout: config.timeoutMs });
  }

  async resolveMediaUrl(mediaId: string): Promise<string | null> {
    try {
      const response = await this.http.get<MediaInfoResponse>(
        `${this.config.apiBaseUrl}/${encodeURIComponent(mediaId)}`,
        { headers: this.authHeaders() }
      );
      return response.data.url ?? null;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw new UpstreamFailureError('Could not resolve media', { mediaId, reason: errorMessage(error) });
    }
  }

  async download(url: string): Promise<DownloadedMedia> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        headers: isPlatformHost(url) ? this.authHeaders() : {},
        responseType: 'arraybuffer',
        maxContentLength: this.config.maxContentLength
      });

      const data = Buffer.from(response.data);
      const contentType = response.headers['content-type'];

      return {
        data,
        contentType: typeof contentType === 'string' ? contentType : '',
        size: data.length
      };
    } catch (error) {
      if (isSizeOverflow(error)) {
        throw new PayloadTooLargeError(
          `Image is larger than ${Math.floor(this.config.maxContentLength / (1024 * 1024))} MB`,
          { url, maxSize: this.config.maxContentLength }
        );
      }
      this.logger.warn(`Media download from ${url} failed: ${errorMessage(error)}`);
      throw new UpstreamFailureError('Failed to download image', { url });
    }
  }

  private authHeaders(): Record<string, string> {
    return this.config.apiToken ? { Authorization: `Bearer ${this.config.apiToken}` } : {};
  }
}

// The bearer token is only sent to the platform's own media hosts.
const PLATFORM_HOST_SUFFIXES = ['.facebook.com', '.fbsbx.com', '.whatsapp.net'];

function isPlatformHost(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return PLATFORM_HOST_SUFFIXES.some((suffix) => hostname.endsWith(suffix));
  } catch {
    return false;
  }
}

// axios aborts the body read with this message once maxContentLength is passed.
function isSizeOverflow(error: unknown): boolean {
  return axios.isAxiosError(error) && error.message.startsWith('maxContentLength size of');
}
