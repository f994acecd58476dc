import { setTimeout as sleep } from "node:timers/promises";

import fetch, { type RequestInit, type Response } from "node-fetch";

import { ProviderError } from "../errors.js";

export interface ProviderCallOptions {
  provider: string;
  timeoutMs: number;
  /** Cancels the exchange when the caller gives up on it. */
  signal?: AbortSignal;
}

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Rejects with an AbortError as soon as `signal` fires. */
export const defaultWait: WaitFn = (ms, signal) => sleep(ms, undefined, { signal });

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/$/, "")}/${path.replace(/^\//, "")}`;
}

/**
 * Runs one HTTP exchange with an abort deadline covering both the request and
 * reading the body.
 */
export async function callProvider<T>(
  url: string,
  init: RequestInit,
  options: ProviderCallOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const cancel = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  }
  options.signal?.addEventListener("abort", cancel, { once: true });
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (error instanceof ProviderError) {
      throw error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      if (options.signal?.aborted) {
        throw new ProviderError(options.provider, `${options.provider} request cancelled`);
      }
      throw new ProviderError(options.provider, `${options.provider} request timed out`);
    }
    throw new ProviderError(
      options.provider,
      `${options.provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", cancel);
  }
}

export async function readJson(provider: string, response: Response): Promise<unknown> {
  if (!response.ok) {
    const text = await response.text();
    throw new ProviderError(provider, `${provider} API error: ${response.status} ${text}`, response.status);
  }
  return response.json();
}
