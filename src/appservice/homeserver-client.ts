import { z } from 'zod';

export class HomeserverError extends Error {
  constructor(
    readonly status: number,
    readonly errcode: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HomeserverError';
  }
}

/** The outbound calls the appservice handlers depend on. */
export interface HomeserverApi {
  joinRoom(roomIdOrAlias: string): Promise<string>;
  pingAppservice(appserviceId: string, transactionId: string): Promise<number>;
}

export interface HomeserverClientOptions {
  baseUrl: string;
  /** The registration's `as_token`. */
  accessToken: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const errorBodySchema = z.object({
  errcode: z.string(),
  error: z.string().optional(),
});

const joinResponseSchema = z.object({ room_id: z.string() });
const pingResponseSchema = z.object({ duration_ms: z.number() });

const parseBody = (raw: string): unknown => {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { raw };
  }
};

export class HomeserverClient implements HomeserverApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HomeserverClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async joinRoom(roomIdOrAlias: string): Promise<string> {
    const payload = await this.request('POST', `/_matrix/client/v3/join/${encodeURIComponent(roomIdOrAlias)}`, {});
    return this.expect(joinResponseSchema, payload, 'join').room_id;
  }

  /**
   * Asks the homeserver to ping this appservice back with `transactionId`.
   * Resolves to the round trip the homeserver measured.
   */
  async pingAppservice(appserviceId: string, transactionId: string): Promise<number> {
    const payload = await this.request('POST', `/_matrix/client/v1/appservice/${encodeURIComponent(appserviceId)}/ping`, {
      transaction_id: transactionId,
    });
    return this.expect(pingResponseSchema, payload, 'appservice ping').duration_ms;
  }

  private expect<TSchema extends z.ZodTypeAny>(schema: TSchema, payload: unknown, call: string): z.output<TSchema> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new HomeserverError(502, 'M_UNKNOWN', `unexpected ${call} response from homeserver`, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async request(method: 'GET' | 'POST' | 'PUT', route: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${this.options.accessToken}`,
    };
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${route}`, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HomeserverError(0, 'M_UNKNOWN', `unable to reach homeserver at ${this.baseUrl}: ${reason}`, { cause: error });
    }

    const payload = parseBody(await res.text());
    if (!res.ok) {
      const parsed = errorBodySchema.safeParse(payload);
      const errcode = parsed.success ? parsed.data.errcode : 'M_UNKNOWN';
      const message = parsed.success && parsed.data.error ? parsed.data.error : `homeserver responded ${res.status}`;
      throw new HomeserverError(res.status, errcode, message);
    }
    return payload;
  }
}
