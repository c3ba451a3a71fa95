import type { MatrixErrorBody, MatrixErrorCode } from '../shared/protocol.js';
import { jsonResponse, type OutgoingResponseSchema } from './schema.js';

export type ProtocolErrorKind =
  | 'Deserialization'
  | 'Unauthorized'
  | 'MissingBody'
  | 'PayloadTooLarge'
  | 'Unrecognized'
  | 'MethodNotAllowed'
  | 'Internal';

interface ErrorShape {
  status: number;
  errcode: MatrixErrorCode;
  message: string;
}

const SHAPES: Record<ProtocolErrorKind, ErrorShape> = {
  Deserialization: { status: 400, errcode: 'M_BAD_JSON', message: 'Deserialization error' },
  Unauthorized: { status: 401, errcode: 'M_UNAUTHORIZED', message: 'Unauthorized' },
  MissingBody: { status: 500, errcode: 'M_UNKNOWN', message: 'Missing body' },
  PayloadTooLarge: { status: 413, errcode: 'M_TOO_LARGE', message: 'Request body too large' },
  Unrecognized: { status: 404, errcode: 'M_UNRECOGNIZED', message: 'Unrecognized request' },
  MethodNotAllowed: { status: 405, errcode: 'M_UNRECOGNIZED', message: 'Method not allowed' },
  Internal: { status: 500, errcode: 'M_UNKNOWN', message: 'Internal server error' },
};

/**
 * Client-facing error of the appservice API. Serialized as the standard
 * `{errcode, error}` body with the status of its kind.
 */
export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly status: number;
  readonly errcode: MatrixErrorCode;

  constructor(kind: ProtocolErrorKind, options?: { cause?: unknown }) {
    const shape = SHAPES[kind];
    super(shape.message, options);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.status = shape.status;
    this.errcode = shape.errcode;
  }

  toBody(): MatrixErrorBody {
    return { errcode: this.errcode, error: this.message };
  }
}

export const isProtocolError = (error: unknown): error is ProtocolError => error instanceof ProtocolError;

export const protocolErrorResponse: OutgoingResponseSchema<ProtocolError> = jsonResponse(
  (error) => error.toBody(),
  (error) => error.status,
);
