/**
 * Route handling for the rubify REST API
 *
 * Routes take the request body as bytes and return a response description;
 * reading the socket and writing the reply is left to the server.
 */

import type { Readable } from 'stream';
import {
  AnalysisError,
  ERROR_PREFIX,
  InvalidRequestError,
  decodeJson,
  printPerfCountersAndReset,
  render,
  serializeTokens,
  toAnalyzeRequest,
  type AnalysisErrorKind,
  type AnalyzeRequest,
  type FuriganaAnalyzer,
  type RenderFormat,
  type RenderOptions
} from '@rubify/core';

export const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export const JSON_CONTENT_TYPE = 'application/json';
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface ApiResponse {
  status: number;
  contentType: string;
  body: string;
}

export interface RouteContext {
  analyzer: FuriganaAnalyzer;
  /** Applied to /api/analyze and /api/render requests that bring no user_dict_csv */
  defaultUserDictCsv?: string;
}

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

const STATUS_BY_KIND: Record<AnalysisErrorKind, number> = {
  'invalid-request': 400,
  'user-dictionary': 400,
  tokenization: 500,
  serialization: 500
};

const decoder = new TextDecoder();

export function errorStatus(error: AnalysisError): number {
  return STATUS_BY_KIND[error.kind];
}

export function json(data: unknown, status = 200): ApiResponse {
  return { status, contentType: JSON_CONTENT_TYPE, body: JSON.stringify(data) };
}

export function errorResponse(message: string, status = 400): ApiResponse {
  return json({ error: message }, status);
}

/**
 * Collect a request body, refusing anything over the size limit or cut off
 * before its end.
 */
export async function readBody(req: Readable, contentLengthHeader?: string): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let ended = false;

    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const abort = (error: JsonBodyError) => {
      req.destroy();
      reject(error);
    };

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      received += buffer.length;
      if (received > MAX_JSON_BODY_SIZE) {
        abort(new JsonBodyError('Payload too large', 413));
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      ended = true;
      resolve(Buffer.concat(chunks));
    });

    req.on('close', () => {
      if (!ended) {
        reject(new JsonBodyError('Request aborted', 400));
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withDefaults(request: AnalyzeRequest, context: RouteContext): AnalyzeRequest {
  if (request.userDictCsv !== undefined || context.defaultUserDictCsv === undefined) {
    return request;
  }
  return { ...request, userDictCsv: context.defaultUserDictCsv };
}

function isRenderFormat(value: unknown): value is RenderFormat {
  return value === 'text' || value === 'html';
}

export function toRenderOptions(body: unknown): { format: RenderFormat; options: RenderOptions } {
  const record: Record<string, unknown> = isRecord(body) ? body : {};
  const format = record.format ?? 'text';
  const hiragana = record.hiragana ?? false;
  if (!isRenderFormat(format)) {
    throw new InvalidRequestError('Invalid request: format must be one of text, html');
  }
  if (typeof hiragana !== 'boolean') {
    throw new InvalidRequestError('Invalid request: hiragana must be a boolean');
  }
  return { format, options: { hiragana } };
}

function analyzeRoute(context: RouteContext, body: Uint8Array): ApiResponse {
  const request = withDefaults(toAnalyzeRequest(decodeJson(body)), context);
  const result = context.analyzer.analyze(request);
  if (!result.ok) throw result.error;

  const tokens = serializeTokens(result.tokens, context.analyzer.layout);
  return {
    status: 200,
    contentType: JSON_CONTENT_TYPE,
    body: `{"text":${JSON.stringify(request.text)},"tokens":${tokens}}`
  };
}

function renderRoute(context: RouteContext, body: Uint8Array): ApiResponse {
  const parsed = decodeJson(body);
  const request = withDefaults(toAnalyzeRequest(parsed), context);
  const { format, options } = toRenderOptions(parsed);

  const result = context.analyzer.analyze(request);
  if (!result.ok) throw result.error;

  return json({ text: request.text, rendered: render(result.tokens, format, options) });
}

function rawRoute(context: RouteContext, body: Uint8Array): ApiResponse {
  const output = decoder.decode(context.analyzer.analyzeBytes(body));
  const contentType = output.startsWith(ERROR_PREFIX) ? TEXT_CONTENT_TYPE : JSON_CONTENT_TYPE;
  return { status: 200, contentType, body: output };
}

function apiDocs(): ApiResponse {
  return json({
    name: 'rubify REST API',
    version: '0.1.0',
    endpoints: {
      'GET /health': 'Health check',
      'POST /api/analyze': 'Tokens with ruby segments (body: {text: string, user_dict_csv?: string})',
      'POST /api/render': 'Text with furigana (body: {text: string, user_dict_csv?: string, format?: "text" | "html", hiragana?: boolean})',
      'POST /api/analyze/raw': 'Byte channel: token JSON, or "Error: ..." as text/plain'
    },
    examples: {
      analyze: {
        url: '/api/analyze',
        body: { text: '東京へ行きます' }
      },
      render: {
        url: '/api/render',
        body: { text: '漢字を食べた', format: 'html', hiragana: true }
      }
    }
  });
}

type PostRoute = (context: RouteContext, body: Uint8Array) => ApiResponse;

const POST_ROUTES: Record<string, PostRoute> = {
  '/api/analyze': analyzeRoute,
  '/api/render': renderRoute,
  '/api/analyze/raw': rawRoute
};

export function isPostRoute(method: string, pathname: string): boolean {
  return method === 'POST' && Object.hasOwn(POST_ROUTES, pathname);
}

/**
 * Dispatch one request. Analysis failures become `{error}` responses with
 * the status for their kind; anything else propagates to the server.
 */
export function handleRoute(context: RouteContext, method: string, pathname: string, body: Uint8Array = new Uint8Array()): ApiResponse {
  if (method === 'GET' && pathname === '/health') {
    return json({ status: 'ok', timestamp: new Date().toISOString() });
  }

  if (method === 'GET' && pathname === '/api') {
    return apiDocs();
  }

  const route = isPostRoute(method, pathname) ? POST_ROUTES[pathname] : undefined;
  if (!route) {
    return errorResponse('Not found', 404);
  }

  try {
    return route(context, body);
  } catch (error) {
    if (error instanceof AnalysisError) {
      return errorResponse(error.message, errorStatus(error));
    }
    throw error;
  } finally {
    printPerfCountersAndReset();
  }
}
