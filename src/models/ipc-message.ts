import { z } from 'zod';
import { ProtocolError, type DaemonError } from '../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../lib/result-types.js';

// ============================================================================
// Request payloads
// ============================================================================

export const PingDataSchema = z.object({}).passthrough();

export const LogCommandDataSchema = z.object({
  command: z.string().min(1).describe("Raw command text"),
  cwd: z.string().min(1).describe("Working directory the command ran in"),
  exit_code: z.number().int().default(0),
  duration: z.number().min(0).nullable().default(0).describe("Duration in seconds"),
  timestamp: z.number().int().nonnegative().optional().describe("Epoch milliseconds"),
  session_id: z.string().min(1).optional(),
});

export const SuggestDataSchema = z.object({
  partial: z.string(),
  cwd: z.string().optional(),
  history: z.array(z.string()).optional().describe("Recent commands, oldest first"),
});

export const HistoryDataSchema = z.object({
  limit: z.number().int().min(1).max(10_000).default(20),
  search: z.string().optional().describe("Full-text query"),
  query: z.string().optional().describe("Alias of search"),
  cwd: z.string().optional(),
});

export const GetConfigDataSchema = z.object({
  key: z.string().min(1).optional(),
});

export const SetConfigDataSchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
});

export const ExplainDataSchema = z.object({
  command: z.string().min(1),
});

const EmptyDataSchema = z.object({}).passthrough();

// ============================================================================
// Request envelope
// ============================================================================

export const IpcRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping'), data: PingDataSchema.default({}) }),
  z.object({ type: z.literal('log_command'), data: LogCommandDataSchema }),
  z.object({ type: z.literal('suggest'), data: SuggestDataSchema }),
  z.object({ type: z.literal('complete'), data: SuggestDataSchema }),
  z.object({ type: z.literal('get_history'), data: HistoryDataSchema.default({}) }),
  z.object({ type: z.literal('search'), data: HistoryDataSchema.default({}) }),
  z.object({ type: z.literal('get_analytics'), data: EmptyDataSchema.default({}) }),
  z.object({ type: z.literal('get_config'), data: GetConfigDataSchema.default({}) }),
  z.object({ type: z.literal('set_config'), data: SetConfigDataSchema }),
  z.object({ type: z.literal('explain_command'), data: ExplainDataSchema }),
  z.object({ type: z.literal('status'), data: EmptyDataSchema.default({}) }),
  z.object({ type: z.literal('shutdown'), data: EmptyDataSchema.default({}) }),
]);

export type IpcRequest = z.infer<typeof IpcRequestSchema>;
export type RequestType = IpcRequest['type'];
export type LogCommandData = z.infer<typeof LogCommandDataSchema>;
export type SuggestData = z.infer<typeof SuggestDataSchema>;
export type HistoryData = z.infer<typeof HistoryDataSchema>;

export const REQUEST_TYPES: readonly RequestType[] = IpcRequestSchema.options.map(
  (option) => option.shape.type.value
);

export function isRequestType(value: string): value is RequestType {
  return (REQUEST_TYPES as readonly string[]).includes(value);
}

/**
 * Request as sent by a client, before validation
 */
export interface OutgoingRequest {
  type: RequestType;
  data: Record<string, unknown>;
}

// ============================================================================
// Responses
// ============================================================================

export interface OkResponse {
  status: 'ok';
  [key: string]: unknown;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
  code: string;
  fatal: boolean;
}

export type IpcResponse = OkResponse | ErrorResponse;

export const IpcResponseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok') }).passthrough(),
  z.object({
    status: z.literal('error'),
    message: z.string(),
    code: z.string().default('UNKNOWN'),
    fatal: z.boolean().default(false),
  }),
]);

export function okResponse(payload: Record<string, unknown> = {}): OkResponse {
  return { ...payload, status: 'ok' };
}

/**
 * Error responses are retryable unless tagged fatal
 */
export function errorResponse(error: DaemonError): ErrorResponse {
  return {
    status: 'error',
    message: error.message,
    code: error.code,
    fatal: !error.retryable,
  };
}

// ============================================================================
// Parsing
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lowercaseKeys(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key.toLowerCase()] = entry;
  }
  return result;
}

/**
 * Envelope and payload keys are matched case-insensitively, and so is the
 * type tag; nested values are left untouched.
 */
export function normalizeRequest(raw: Record<string, unknown>): Record<string, unknown> {
  const envelope = lowercaseKeys(raw);
  if (typeof envelope.type === 'string') {
    envelope.type = envelope.type.toLowerCase();
  }
  if (isPlainObject(envelope.data)) {
    envelope.data = lowercaseKeys(envelope.data);
  }
  return envelope;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decode one frame into a validated request
 */
export function parseRequest(frame: string): Result<IpcRequest, ProtocolError> {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return err(new ProtocolError('Malformed JSON'));
  }

  if (!isPlainObject(raw)) {
    return err(new ProtocolError('Request must be a JSON object'));
  }

  const envelope = normalizeRequest(raw);
  const type = envelope.type;
  if (typeof type !== 'string' || type.length === 0) {
    return err(new ProtocolError('Missing message type'));
  }
  if (!isRequestType(type)) {
    return err(new ProtocolError(`Unknown message type: ${type}`, type));
  }

  const parsed = IpcRequestSchema.safeParse(envelope);
  if (!parsed.success) {
    return err(new ProtocolError(`Invalid payload for ${type}: ${describeIssues(parsed.error)}`, type));
  }
  return ok(parsed.data);
}
