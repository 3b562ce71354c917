#!/usr/bin/env node

/**
 * REST API server for rubify
 * Exposes furigana analysis and rendering over HTTP
 */

import { readFileSync } from 'fs';
import { createServer, IncomingMessage, ServerResponse } from 'http';
import { pathToFileURL } from 'url';
import { config } from 'dotenv';
import {
  FuriganaAnalyzer,
  getConfigFromEnv,
  loadKuromojiTokenizer,
  printPerfCountersAndReset,
  setDebug
} from '@rubify/core';
import {
  JsonBodyError,
  errorResponse,
  handleRoute,
  isPostRoute,
  readBody,
  type ApiResponse,
  type RouteContext
} from './routes.js';

export * from './routes.js';

/**
 * Send a route response
 */
function send(res: ServerResponse, response: ApiResponse, requestId?: string): void {
  res.writeHead(response.status, { 'Content-Type': response.contentType });
  res.end(response.body);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${Buffer.byteLength(response.body)} bytes, status ${response.status}`);
  }
}

/**
 * Build the request handler around a loaded analyzer
 */
export function createRequestHandler(context: RouteContext): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return async (req, res) => {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

    console.log(`[${requestId}] START ${method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    // Handle OPTIONS for CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
      return;
    }

    try {
      const body = isPostRoute(method, url.pathname)
        ? await readBody(req, req.headers['content-length'])
        : undefined;
      const response = handleRoute(context, method, url.pathname, body);
      if (response.status >= 400) {
        console.log(`[${requestId}] ${response.body}`);
      }
      send(res, response, requestId);
      console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
    } catch (error) {
      console.error(`[${requestId}] Request error:`, error);
      if (error instanceof JsonBodyError) {
        send(res, errorResponse(error.message, error.status), requestId);
      } else {
        const message = error instanceof Error ? error.message : 'Internal server error';
        send(res, errorResponse(message, 500), requestId);
      }
      console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
    }
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  config();
  const settings = getConfigFromEnv();
  setDebug(settings.debug);

  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  console.log('Loading kuromoji dictionary...');
  const tokenizer = await loadKuromojiTokenizer(settings.dictPath);
  console.log('Dictionary loaded');

  const context: RouteContext = {
    analyzer: new FuriganaAnalyzer({ tokenizer, layout: settings.layout })
  };
  if (settings.userDictPath) {
    context.defaultUserDictCsv = readFileSync(settings.userDictPath, 'utf-8');
    console.log(`Default user dictionary: ${settings.userDictPath}`);
  }

  const handler = createRequestHandler(context);
  const server = createServer((req, res) => {
    handler(req, res).catch((error) => {
      console.error('Unhandled request failure:', error);
    });
  });

  // Bind to 0.0.0.0 to allow external connections
  server.listen(settings.port, '0.0.0.0', () => {
    console.log(`rubify API server listening on http://0.0.0.0:${settings.port}`);
    console.log(`Health check: http://0.0.0.0:${settings.port}/health`);
    console.log(`API docs: http://0.0.0.0:${settings.port}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      printPerfCountersAndReset();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  });
}
