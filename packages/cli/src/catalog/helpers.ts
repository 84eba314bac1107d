import {
  defineAction,
  type HttpResponse,
  type ServiceAction,
  type ServiceContext,
} from '@minidev/core';
import { ServiceError } from '../errors';
import { formatBody } from '../services/http.service';

/**
 * First pod matching the selector, or a ServiceError naming the service
 */
export async function requirePod(ctx: ServiceContext, selector: string, label: string): Promise<string> {
  const pod = await ctx.kube.firstPod(selector, ctx.namespace);
  if (!pod) {
    throw new ServiceError(label, `${label} pod not found`);
  }
  return pod;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD-HHMMSS, used for backup file names
 */
export function timestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * In-cluster DNS name of a service
 */
export function clusterHost(service: string, namespace: string): string {
  return `${service}.${namespace}.svc.cluster.local`;
}

/**
 * Resolve `http://<minikube ip>:<nodeport>` for a named service port
 */
export async function serviceUrl(ctx: ServiceContext, service: string, portName: string): Promise<string> {
  const ip = await ctx.cluster.ip();
  const port = await ctx.kube.nodePort(service, ctx.namespace, portName);
  if (!ip || !port) {
    throw new ServiceError(service, `Could not determine URL for ${service} (is it deployed?)`);
  }
  return `http://${ip}:${port}`;
}

/**
 * `minikube service <name>` opens the service in a browser
 */
export function openServiceAction(
  name: string,
  aliases: string[],
  service: string,
  label: string
): ServiceAction {
  return defineAction({
    name,
    aliases,
    description: `Open ${label} in the browser`,
    run: async (ctx) => {
      ctx.out.info(`Opening ${label}...`);
      await ctx.cluster.openService(service, ctx.namespace);
    },
  });
}

/**
 * Print an HTTP response body, warning on non-2xx status
 */
export function printResponse(ctx: ServiceContext, response: HttpResponse): void {
  ctx.out.line(formatBody(response.body));
  if (!response.ok) {
    ctx.out.warning(`Request failed with status ${response.status}`);
  }
}

/**
 * Parse a JSON document given on the command line
 */
export function parseDocument(service: string, raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new ServiceError(service, `Invalid JSON document: ${raw}`);
  }
}

/**
 * UTC timestamp without milliseconds, e.g. 2024-05-01T12:00:00Z
 */
export function isoSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
