/**
 * Title translator (LibreTranslate-compatible).
 * Bounded retries with exponential backoff; never fails the caller.
 */

import { createLogger, errorMessage } from '../shared/log.js';
import type { TitleTranslator, TranslatorConfig } from '../shared/types.js';

const log = createLogger('translate');

export type Sleep = (ms: number) => Promise<void>;

export interface TranslatorOptions {
  /** Replaces the backoff wait (tests) */
  sleep?: Sleep;
}

type AttemptOutcome =
  | { kind: 'translated'; text: string }
  | { kind: 'failed'; reason: string };

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs = 1000): number {
  return baseDelayMs * 2 ** attempt;
}

function readTranslatedText(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('translatedText' in body)) return undefined;
  const value = body.translatedText;
  return typeof value === 'string' ? value : undefined;
}

export class Translator implements TitleTranslator {
  private readonly baseUrl: string;
  private readonly sleep: Sleep;

  constructor(private readonly config: TranslatorConfig, opts: TranslatorOptions = {}) {
    this.baseUrl = config.url.replace(/\/$/, '');
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Translate text. After maxAttempts failed attempts the input comes back
   * unchanged.
   */
  async translate(text: string, sourceLang = this.config.source, targetLang = this.config.target): Promise<string> {
    const maxAttempts = this.config.maxAttempts;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (attempt === 0) await this.probe();

      log.info(`Attempting to translate '${text}' (attempt ${attempt + 1}/${maxAttempts})`);
      const outcome = await this.attempt(text, sourceLang, targetLang);

      if (outcome.kind === 'translated') {
        log.success(`Translation successful: '${text}' -> '${outcome.text}'`);
        return outcome.text;
      }

      log.warn(`Translation of '${text}' failed (attempt ${attempt + 1}/${maxAttempts}): ${outcome.reason}`);

      if (attempt < maxAttempts - 1) {
        const delay = backoffDelay(attempt, this.config.baseDelayMs);
        log.info(`Waiting ${delay}ms before retry...`);
        await this.sleep(delay);
      }
    }

    log.warn(`Translation failed after ${maxAttempts} attempts. Returning original title: '${text}'`);
    return text;
  }

  /**
   * Best-effort reachability check; only ever logs.
   */
  async probe(): Promise<boolean> {
    try {
      const status = await this.fetchWithTimeout(`${this.baseUrl}/`, { method: 'GET' }, async (res) => res.status);
      if (status < 200 || status >= 300) {
        log.warn(`Translation service health check failed: HTTP ${status}`);
        return false;
      }
      return true;
    } catch (err) {
      log.warn(`Translation service health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async attempt(text: string, source: string, target: string): Promise<AttemptOutcome> {
    try {
      return await this.fetchWithTimeout(
        `${this.baseUrl}/translate`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify({ q: text, source, target, format: 'text' }),
        },
        async (res): Promise<AttemptOutcome> => {
          if (!res.ok) {
            const detail = await res.text();
            return { kind: 'failed', reason: `HTTP ${res.status}${detail ? ` ${detail}` : ''}` };
          }
          const body: unknown = await res.json();
          return { kind: 'translated', text: readTranslatedText(body) ?? text };
        }
      );
    } catch (err) {
      return { kind: 'failed', reason: errorMessage(err) };
    }
  }

  /** The timeout covers reading the body as well as the headers */
  private async fetchWithTimeout<T>(url: string, init: RequestInit, read: (res: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const res = await fetch(url, { ...init, signal: controller.signal });
      return await read(res);
    } finally {
      clearTimeout(timer);
    }
  }
}
