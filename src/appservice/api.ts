import { z } from 'zod';
import {
  accessToken,
  decodeJsonBody,
  emptyResponse,
  jsonResponse,
  type IncomingRequestSchema,
  type OutgoingResponseSchema,
} from '../protocol/schema.js';

// POST /_matrix/app/v1/ping

const pingBodySchema = z.object({
  transaction_id: z.string().nullish(),
});

export interface PingRequest {
  accessToken: string | null;
  transactionId: string | null;
}

export type PingResponse = Record<string, never>;

export const pingRequest: IncomingRequestSchema<PingRequest> = {
  metadata: {
    name: 'appservice_ping',
    method: 'POST',
    paths: ['/_matrix/app/v1/ping'],
  },
  tryFromHttpRequest: (request) => {
    const body = decodeJsonBody(pingBodySchema, request.body);
    return {
      accessToken: accessToken(request),
      transactionId: body.transaction_id || null,
    };
  },
};

export const pingResponse: OutgoingResponseSchema<PingResponse> = jsonResponse(() => ({}));

// PUT /_matrix/app/v1/transactions/:txnId

const pushEventsBodySchema = z.object({
  events: z.array(z.unknown()),
  ephemeral: z.array(z.unknown()).optional(),
});

export interface PushEventsRequest {
  accessToken: string | null;
  txnId: string;
  /** Serialized room events, kept opaque until the handler classifies them. */
  events: unknown[];
  ephemeral: unknown[];
}

export type PushEventsResponse = Record<string, never>;

export const pushEventsRequest: IncomingRequestSchema<PushEventsRequest> = {
  metadata: {
    name: 'push_events',
    method: 'PUT',
    paths: ['/_matrix/app/v1/transactions/:txnId', '/transactions/:txnId'],
  },
  tryFromHttpRequest: (request, [txnId = '']) => {
    const body = decodeJsonBody(pushEventsBodySchema, request.body);
    return {
      accessToken: accessToken(request),
      txnId,
      events: body.events,
      ephemeral: body.ephemeral ?? [],
    };
  },
};

export const pushEventsResponse: OutgoingResponseSchema<PushEventsResponse> = emptyResponse(200);
