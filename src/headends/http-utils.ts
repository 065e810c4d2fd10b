import type http from 'node:http';
import type { z } from 'zod/v3';

export const DEFAULT_BODY_LIMIT = 1024 * 1024; // 1 MiB

/** A request failure with the status, error code and headers it answers with. */
export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly headers?: Record<string, string>;

  public constructor(statusCode: number, code: string, message: string, headers?: Record<string, string>) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code;
    this.headers = headers;
  }
}

const tooLarge = (limit: number): HttpError =>
  new HttpError(413, 'payload_too_large', `Request body exceeds ${String(limit)} bytes`);

export const readBody = async (req: http.IncomingMessage, limit = DEFAULT_BODY_LIMIT): Promise<string> => {
  // refuse before reading when the client already says it is too big
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) throw tooLarge(limit);

  const chunks: Buffer[] = [];
  let total = 0;
  return await new Promise<string>((resolve, reject) => {
    req.on('data', (chunk: Buffer | string) => {
      const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      total += buf.length;
      if (total > limit) {
        reject(tooLarge(limit));
        req.destroy();
        return;
      }
      chunks.push(buf);
    });
    req.on('end', () => { resolve(Buffer.concat(chunks).toString('utf8')); });
    req.on('error', (err) => { reject(err instanceof Error ? err : new Error(String(err))); });
  });
};

export const readJson = async (req: http.IncomingMessage, limit = DEFAULT_BODY_LIMIT): Promise<unknown> => {
  const text = await readBody(req, limit);
  if (text.trim().length === 0) {
    throw new HttpError(400, 'empty_body', 'Request body is required');
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new HttpError(400, 'invalid_json', err instanceof Error ? err.message : 'Invalid JSON body');
  }
};

export const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(body)'}: ${issue.message}`).join('; ');

/** Read a JSON body and check it against `schema`; mismatches answer 400 `invalid_request`. */
export const readValidatedJson = async <T>(
  req: http.IncomingMessage,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  limit = DEFAULT_BODY_LIMIT
): Promise<T> => {
  const parsed = schema.safeParse(await readJson(req, limit));
  if (!parsed.success) throw new HttpError(400, 'invalid_request', formatIssues(parsed.error));
  return parsed.data;
};

export const writeJson = (res: http.ServerResponse, statusCode: number, payload: unknown, headers?: Record<string, string>): void => {
  if (res.writableEnded || res.writableFinished) return;
  const body = JSON.stringify(payload);
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  Object.entries(headers ?? {}).forEach(([key, value]) => {
    res.setHeader(key, value);
  });
  res.setHeader('Content-Length', Buffer.byteLength(body));
  res.end(body);
};
