import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ParseError } from '../../errors.js';
import { classifyHttpError, isRetryableStatus } from '../../utils/httpErrors.js';
import { normalizeShareUrl } from '../../utils/shareUrl.js';
import { ParserConfig } from '../ConfigService.js';
import { MediaAsset, MediaResolver, ParsedMedia } from '../interfaces/PipelineServices.js';
import { MediaType } from '../types/task.js';

const SUCCESS_CODE = 200;

const urlListSchema = z.object({
  url_list: z.array(z.string().url()).min(1)
});

const envelopeSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  message: z.string().optional(),
  data: z.unknown()
});

const payloadSchema = z.object({
  // Ids above 2^53 arrive already rounded when sent as numbers
  aweme_id: z
    .union([z.string().min(1), z.number().refine(Number.isSafeInteger, 'unsafe numeric id')])
    .transform(String),
  desc: z.string().nullish(),
  author: z.object({ nickname: z.string().nullish() }).nullish(),
  video: z
    .object({
      play_addr: urlListSchema.nullish(),
      bit_rate: z
        .array(
          z.object({
            bit_rate: z.number(),
            gear_name: z.string().nullish(),
            play_addr: urlListSchema
          })
        )
        .nullish()
    })
    .nullish(),
  images: z
    .array(
      z.object({
        url_list: z.array(z.string().url()).min(1),
        video: z.object({ play_addr: urlListSchema }).nullish()
      })
    )
    .nullish()
});

type ParserPayload = z.infer<typeof payloadSchema>;

/**
 * Client for the third-party share-link parser.
 *
 * GET <apiUrl>?url=<share link>&minimal=false answers with
 * `{ code, msg, data }`; `data` carries the post id, text, author and either
 * a `video` (with per-bitrate variants) or an `images` array whose entries
 * may hold a motion clip (live photos).
 */
export class ParserApiAdapter implements MediaResolver {
  constructor(
    private readonly http: AxiosInstance,
    private readonly config: ParserConfig
  ) {}

  async resolve(url: string): Promise<ParsedMedia> {
    const shareUrl = normalizeShareUrl(url, this.config.allowedHosts);

    if (!this.config.apiUrl) {
      throw new ParseError('parser endpoint is not configured');
    }

    console.log(`Resolving share link via parser API: ${shareUrl}`);

    let body: unknown;
    try {
      const response = await this.http.get(this.config.apiUrl, {
        params: { url: shareUrl, minimal: 'false' },
        timeout: this.config.timeoutMs,
        validateStatus: () => true
      });

      if (response.status < 200 || response.status >= 300) {
        throw new ParseError(`parser API responded with HTTP ${response.status}`, {
          retryable: isRetryableStatus(response.status)
        });
      }
      body = response.data;
    } catch (error) {
      if (error instanceof ParseError) throw error;
      const failure = classifyHttpError(error);
      throw new ParseError(`parser API unreachable: ${failure.message}`, {
        retryable: failure.retryable,
        cause: error
      });
    }

    return this.parseEnvelope(body);
  }

  parseEnvelope(body: unknown): ParsedMedia {
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ParseError('parser response schema mismatch: invalid envelope');
    }

    if (envelope.data.code !== SUCCESS_CODE) {
      const upstreamMessage = envelope.data.msg ?? envelope.data.message ?? 'no message';
      throw new ParseError(`parser rejected link (code ${envelope.data.code}): ${upstreamMessage}`, {
        retryable: true
      });
    }

    const payload = payloadSchema.safeParse(envelope.data.data);
    if (!payload.success) {
      const issue = payload.error.issues[0];
      const field = issue ? issue.path.join('.') || 'data' : 'data';
      throw new ParseError(`parser response schema mismatch at ${field}`);
    }

    const { mediaType, assets } = this.classify(payload.data);
    if (assets.length === 0) {
      throw new ParseError('parser response schema mismatch: no downloadable media');
    }

    return {
      contentId: payload.data.aweme_id,
      description: payload.data.desc ?? '',
      author: payload.data.author?.nickname ?? '',
      mediaType,
      assets
    };
  }

  private classify(payload: ParserPayload): { mediaType: MediaType; assets: MediaAsset[] } {
    const images = payload.images ?? [];

    if (images.length > 0) {
      const isLivePhoto = images.some(image => image.video?.play_addr);
      const assets: MediaAsset[] = [];

      images.forEach((image, index) => {
        assets.push({ url: image.url_list[0], kind: 'image', label: `image_${index + 1}` });
        const clip = image.video?.play_addr?.url_list[0];
        if (clip) {
          assets.push({ url: clip, kind: 'video', label: `live_${index + 1}` });
        }
      });

      return { mediaType: isLivePhoto ? 'live_photo' : 'image', assets };
    }

    const variants = (payload.video?.bit_rate ?? []).map(variant => ({
      url: variant.play_addr.url_list[0],
      kind: 'video' as const,
      bitRate: variant.bit_rate,
      label: variant.gear_name ?? undefined
    }));

    if (variants.length > 0) {
      return { mediaType: 'video', assets: variants };
    }

    const fallback = payload.video?.play_addr?.url_list[0];
    return {
      mediaType: 'video',
      assets: fallback ? [{ url: fallback, kind: 'video' }] : []
    };
  }
}
