import { z } from 'zod';
import { safeEqual } from '../security/compare.js';
import type { HttpResponseParts } from '../shared/protocol.js';
import type { Logger } from '../utils/logger.js';

const webhookEventSchema = z.object({
  event: z.string(),
  secret: z.string().nullish(),
  data: z.unknown(),
});

export type WebhookEvent = z.infer<typeof webhookEventSchema>;

const freeGamesSchema = z.array(z.number().int().nonnegative());

export type GameId = number;

export type WebhookErrorKind = 'UnsupportedMediaType' | 'MalformedJson' | 'InvalidBody' | 'Json' | 'InvalidEvent' | 'BadSecret';

const STATUS: Record<WebhookErrorKind, number> = {
  UnsupportedMediaType: 415,
  MalformedJson: 400,
  InvalidBody: 422,
  Json: 500,
  InvalidEvent: 400,
  BadSecret: 401,
};

export class WebhookError extends Error {
  readonly status: number;

  constructor(readonly kind: WebhookErrorKind, message: string) {
    super(message);
    this.name = 'WebhookError';
    this.status = STATUS[kind];
  }
}

export interface WebhookHandlerOptions {
  /** Shared secret events must carry; `null` when none is configured. */
  secret: string | null;
  logger: Logger;
}

const text = (status: number, body: string): HttpResponseParts => ({
  status,
  headers: { 'content-type': 'text/plain; charset=utf-8' },
  body: Buffer.from(body, 'utf8'),
});

const isJsonContentType = (contentType: string | undefined) => {
  if (!contentType) return false;
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return mime === 'application/json' || (mime.startsWith('application/') && mime.endsWith('+json'));
};

export class WebhookHandler {
  constructor(private readonly options: WebhookHandlerOptions) {}

  async handle(body: Buffer, contentType: string | undefined): Promise<HttpResponseParts> {
    try {
      const event = this.decode(body, contentType);
      this.checkSecret(event.secret ?? null);
      return await this.dispatch(event);
    } catch (error) {
      if (error instanceof WebhookError) {
        return text(error.status, error.message);
      }
      throw error;
    }
  }

  decode(body: Buffer, contentType: string | undefined): WebhookEvent {
    if (!isJsonContentType(contentType)) {
      throw new WebhookError('UnsupportedMediaType', 'Expected request with `Content-Type: application/json`');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body.toString('utf8')) as unknown;
    } catch {
      throw new WebhookError('MalformedJson', 'Failed to parse the request body as JSON');
    }

    const parsed = webhookEventSchema.safeParse(raw);
    if (!parsed.success) {
      throw new WebhookError('InvalidBody', 'Failed to deserialize the JSON body into the target type');
    }
    return parsed.data;
  }

  checkSecret(presented: string | null) {
    const { secret: configured, logger } = this.options;

    if (configured !== null && presented !== null) {
      if (!safeEqual(presented, configured)) {
        logger.warn('incorrect secret');
        throw new WebhookError('BadSecret', 'unauthorized');
      }
      logger.debug('valid secret', { required: true });
      return;
    }

    if (configured !== null) {
      logger.warn('no secret set for event');
      throw new WebhookError('BadSecret', 'unauthorized');
    }

    if (presented !== null) {
      logger.warn('event had secret, but none is configured');
      return;
    }

    logger.debug('valid secret', { required: false });
  }

  private async dispatch(event: WebhookEvent): Promise<HttpResponseParts> {
    switch (event.event) {
      case 'free_games': {
        const games = this.handlerData(freeGamesSchema, event.data);
        return this.hookFreeGames(games);
      }
      default:
        this.options.logger.error('invalid event', { event: event.event });
        throw new WebhookError('InvalidEvent', `invalid event: ${event.event}`);
    }
  }

  private handlerData<TSchema extends z.ZodTypeAny>(schema: TSchema, data: unknown): z.output<TSchema> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      this.options.logger.error('failed to deserialize handler data', { issues: parsed.error.issues.length });
      throw new WebhookError('Json', 'event serialization failed');
    }
    return parsed.data;
  }

  private async hookFreeGames(games: GameId[]): Promise<HttpResponseParts> {
    this.options.logger.info('free games announced', { count: games.length, games });
    return { status: 200, headers: {}, body: Buffer.alloc(0) };
  }
}
