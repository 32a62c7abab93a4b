import { fetch, ProxyAgent } from "undici";
import type { HttpMethod, ProxyEndpoint } from "./types";

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  proxyUrl?: string;
  timeoutMs: number;
}

export interface TransportResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

/** A single HTTP exchange. Throws on transport errors, resolves for every status code. */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

const proxyAgents = new Map<string, ProxyAgent>();

function agentFor(proxyUrl: string): ProxyAgent {
  const normalized = proxyUrl.includes("://") ? proxyUrl : `http://${proxyUrl}`;
  let agent = proxyAgents.get(normalized);
  if (!agent) {
    agent = new ProxyAgent(normalized);
    proxyAgents.set(normalized, agent);
  }
  return agent;
}

export function proxyUrlFor(endpoint: ProxyEndpoint, targetUrl: string): string {
  return targetUrl.toLowerCase().startsWith("https:") ? endpoint.httpsUrl : endpoint.httpUrl;
}

/** Strips credentials so proxy URLs can be logged. */
export function safeUrlForLog(url: string): string {
  try {
    const parsed = new URL(url.includes("://") ? url : `http://${url}`);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString().replace(/\/$/, "");
  } catch {
    return url;
  }
}

export const undiciTransport: HttpTransport = async (request) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1, request.timeoutMs));
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      redirect: "follow",
      signal: controller.signal,
      ...(request.proxyUrl ? { dispatcher: agentFor(request.proxyUrl) } : {}),
    });
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    const body = await response.text();
    return { url: response.url || request.url, status: response.status, headers, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${request.timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
};
