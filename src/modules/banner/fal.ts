import axios from 'axios';
import { createModuleLogger } from '../../utils/logger';
import { CollaboratorResult, describeFailure, failWith, succeed } from '../../utils/errors';

const logger = createModuleLogger('fal-image');

export interface GeneratedImage {
  // base64-encoded image bytes
  imageData: string;
  url: string;
}

/**
 * Black-box image synthesis: prompt and size in, image out
 */
export interface ImageProvider {
  readonly modelLabel: string;
  generate(prompt: string, width: number, height: number): Promise<CollaboratorResult<GeneratedImage>>;
}

export interface FalConfig {
  apiKey?: string;
  modelId: string;
  endpoint: string;
  timeoutMs?: number;
}

interface FalImageResponse {
  images?: { url?: string }[];
}

export class FalImageProvider implements ImageProvider {
  private config: FalConfig;

  constructor(config: FalConfig) {
    this.config = config;
  }

  get modelLabel(): string {
    return `${this.config.modelId} via fal.ai`;
  }

  async generate(
    prompt: string,
    width: number,
    height: number
  ): Promise<CollaboratorResult<GeneratedImage>> {
    if (!this.config.apiKey) {
      return failWith('image', 'disabled', 'fal.ai API key is not configured');
    }

    const timeout = this.config.timeoutMs ?? 120000;

    try {
      const response = await axios.post<FalImageResponse>(
        `${this.config.endpoint}/${this.config.modelId}`,
        {
          prompt,
          image_size: { width, height },
          num_inference_steps: 4,
          enable_safety_checker: true,
        },
        {
          headers: {
            Authorization: `Key ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout,
        }
      );

      const url = response.data.images?.[0]?.url;
      if (!url) {
        return failWith('image', 'malformed', 'Image response did not include an image URL');
      }

      const download = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout });
      const imageData = Buffer.from(download.data).toString('base64');

      logger.info('Image generated', { width, height, bytes: download.data.byteLength });

      return succeed({ imageData, url });
    } catch (error) {
      const failure = describeFailure('image', error);
      logger.error('Image generation failed', { kind: failure.kind, error: failure.message });
      return { ok: false, error: failure };
    }
  }
}
