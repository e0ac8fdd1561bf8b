import { createServer, type IncomingMessage, type RequestListener, type Server, type ServerResponse } from 'node:http';
import {
  AppError,
  GENERATE_TOKEN_BYTES,
  generateToken,
  handleTokensRequest,
  isAppError,
  parseTokensRequest,
  renderIndexPage,
  toAppError,
  type GenerateResponse,
  type ValidationIssue,
} from '@tokensum/core';
import { FAVICON_PNG, ROCKET_SVG } from './assets.js';
import type { AppConfig } from './config.js';
import { generateOpenApiSpec } from './openapi.js';

export interface ServerOptions {
  /** Greeting rendered on the landing page */
  welcome: string;
  /** Public URL advertised in /openapi.json */
  baseUrl: string;
  /** Log `METHOD path status` for every request */
  accessLog?: boolean;
  /** Override the landing page template */
  templatePath?: string;
}

/** Methods served per path; anything else on a known path gets a 405. */
const ROUTE_METHODS: Record<string, readonly string[]> = {
  '/': ['GET'],
  '/generate': ['GET'],
  '/tokens': ['POST'],
  '/favicon.ico': ['GET'],
  '/static/rocket.png': ['GET'],
  '/openapi.json': ['GET'],
};

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { ...headers, 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendValidationError(res: ServerResponse, issues: ValidationIssue[]): void {
  sendJson(res, 422, { detail: issues });
}

/** `application/json` and structured `+json` media types, parameters stripped. */
const JSON_MEDIA_TYPE = /^application\/(?:[\w.-]+\+)?json$/i;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Bodies without a Content-Type are read as JSON. */
function isJsonContentType(header: string | undefined): boolean {
  if (!header) return true;
  const mediaType = header.split(';')[0].trim();
  return JSON_MEDIA_TYPE.test(mediaType);
}

/**
 * Read and parse a JSON request body. Returns {} for empty bodies;
 * any other decoded value is handed back as-is for schema validation.
 * Bytes that are not valid UTF-8 or text that is not JSON reject with INVALID_JSON.
 */
function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      let raw: string;
      try {
        raw = utf8.decode(Buffer.concat(chunks));
      } catch (err) {
        reject(new AppError('INVALID_JSON', 'Invalid UTF-8 in request body', { cause: err }));
        return;
      }
      if (!raw || raw.trim() === '') { resolve({}); return; }
      try {
        resolve(JSON.parse(raw));
      } catch (err) {
        reject(new AppError('INVALID_JSON', 'JSON decode error', { cause: err }));
      }
    });
    req.on('error', reject);
  });
}

async function handleRequest(options: ServerOptions, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const url = new URL(req.url || '/', 'http://localhost');
  const method = req.method ?? 'GET';

  if (options.accessLog) {
    res.on('finish', () => {
      console.log(`[tokensum] ${method} ${url.pathname} ${res.statusCode}`);
    });
  }

  try {
    // Landing page
    if (url.pathname === '/' && method === 'GET') {
      const html = await renderIndexPage({ welcome: options.welcome, templatePath: options.templatePath });
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(html);
      return;
    }

    // GET /generate
    if (url.pathname === '/generate' && method === 'GET') {
      const body: GenerateResponse = { token: generateToken(GENERATE_TOKEN_BYTES) };
      sendJson(res, 200, body);
      return;
    }

    // POST /tokens
    if (url.pathname === '/tokens' && method === 'POST') {
      if (!isJsonContentType(req.headers['content-type'])) {
        req.resume();
        sendValidationError(res, [
          {
            type: 'model_attributes_type',
            loc: ['body'],
            msg: 'Input should be a valid dictionary or object to extract fields from',
          },
        ]);
        return;
      }

      let raw: unknown;
      try {
        raw = await readJsonBody(req);
      } catch (err) {
        if (!isAppError(err, 'INVALID_JSON')) throw err;
        sendValidationError(res, [{ type: 'json_invalid', loc: ['body'], msg: err.message }]);
        return;
      }

      const parsed = parseTokensRequest(raw);
      if (!parsed.success) {
        sendValidationError(res, parsed.issues);
        return;
      }

      sendJson(res, 200, handleTokensRequest(parsed.data));
      return;
    }

    if (url.pathname === '/favicon.ico' && method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'image/png', 'Cache-Control': 'public, max-age=86400' });
      res.end(FAVICON_PNG);
      return;
    }

    if (url.pathname === '/static/rocket.png' && method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'image/svg+xml', 'Cache-Control': 'public, max-age=86400' });
      res.end(ROCKET_SVG);
      return;
    }

    if (url.pathname === '/openapi.json' && method === 'GET') {
      sendJson(res, 200, generateOpenApiSpec(options.baseUrl));
      return;
    }

    const allowed = ROUTE_METHODS[url.pathname];
    if (allowed) {
      sendJson(res, 405, { detail: 'Method Not Allowed' }, { Allow: allowed.join(', ') });
      return;
    }

    sendJson(res, 404, { detail: 'Not Found' });
  } catch (err) {
    const appError = toAppError(err, 'INTERNAL');
    console.error(`[tokensum] ${method} ${url.pathname} failed (${appError.code}): ${appError.message}`);
    if (!res.headersSent) {
      sendJson(res, 500, { detail: 'Internal Server Error' });
    } else {
      res.end();
    }
  }
}

/** Request listener serving the landing page, token endpoints and static assets. */
export function createRequestListener(options: ServerOptions): RequestListener {
  return (req, res) => {
    handleRequest(options, req, res).catch((err) => {
      console.error('[tokensum] Unhandled request failure:', err);
      res.destroy();
    });
  };
}

export function createAppServer(options: ServerOptions): Server {
  return createServer(createRequestListener(options));
}

/** Start listening on the configured host and port. Resolves once bound. */
export function startServer(config: AppConfig): Promise<Server> {
  const server = createAppServer({
    welcome: config.welcome,
    baseUrl: config.baseUrl,
    accessLog: config.accessLog,
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      console.log(`[tokensum] Server running at http://${config.host}:${config.port}`);
      console.log(`[tokensum] Token form: http://${config.host}:${config.port}/`);
      console.log(`[tokensum] OpenAPI spec: ${config.baseUrl}/openapi.json`);
      resolve(server);
    });
  });
}
