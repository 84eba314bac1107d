/**
 * HTTP client used by service actions that talk to REST APIs
 * (ZincSearch, Elasticsearch, Dex)
 */

import type { HttpClient, HttpRequest, HttpResponse } from '@minidev/core';
import { logDebug } from '../logger';

function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/**
 * Parse a response body as JSON when possible, keeping raw text otherwise
 */
export function parseBody(text: string): unknown {
  if (!text.trim()) {
    return '';
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

export class FetchHttpClient implements HttpClient {
  async request(request: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    let body: string | undefined;

    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = typeof request.body === 'string' ? request.body : JSON.stringify(request.body);
    }
    if (request.auth) {
      headers.Authorization = basicAuth(request.auth.username, request.auth.password);
    }

    logDebug(`${request.method} ${request.url}`, body);

    const response = await fetch(request.url, {
      method: request.method,
      headers,
      body,
    });
    const text = await response.text();

    return {
      status: response.status,
      ok: response.ok,
      body: parseBody(text),
    };
  }
}

/**
 * Render a response body for the terminal
 */
export function formatBody(body: unknown): string {
  return typeof body === 'string' ? body : JSON.stringify(body, null, 2);
}
