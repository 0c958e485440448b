/**
 * Baidu OCR Adapter
 *
 * Cloud OCR over the Baidu AI REST API.
 *
 * Authentication Flow:
 * 1. Exchange API key + secret key for an access token (client_credentials)
 * 2. Cache the token until shortly before it expires
 * 3. POST the base64 image, form-encoded, with the token as a query param
 *
 * Requests are spaced at least 200ms apart (5 QPS account ceiling).
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import { AdapterError, AuthenticationError } from '../errors/docfusion-error.js';
import { ErrorHandler } from '../errors/error-handler.js';
import { clampConfidence, failedResult } from './adapter.js';
import type { AdapterKind, RecognitionAdapter, RecognitionResult, RecognizeOptions } from './adapter.js';

const BAIDU_BASE_URL = 'https://aip.baidubce.com';
const TOKEN_ENDPOINT = '/oauth/2.0/token';
const OCR_ENDPOINT = '/rest/2.0/ocr/v1';

export type BaiduOcrMethod =
  | 'general_basic'
  | 'accurate_basic'
  | 'general'
  | 'accurate'
  | 'handwriting'
  | 'webimage';

export const BAIDU_OCR_METHODS: readonly BaiduOcrMethod[] = [
  'general_basic',
  'accurate_basic',
  'general',
  'accurate',
  'handwriting',
  'webimage',
];

export interface BaiduOcrAdapterOptions {
  apiKey?: string;
  secretKey?: string;
  /** Default: 'accurate_basic' */
  method?: BaiduOcrMethod;
  /** Minimum gap between requests. Default: 200 */
  minIntervalMs?: number;
  /** HTTP timeout. Default: 30000 */
  timeoutMs?: number;
  httpClient?: AxiosInstance;
}

interface BaiduTokenResponse {
  access_token?: string;
  expires_in?: number;
  error?: string;
  error_description?: string;
}

interface BaiduWord {
  words?: string;
  probability?: { average?: number };
}

interface BaiduOcrResponse {
  words_result?: BaiduWord[];
  error_code?: number;
  error_msg?: string;
}

export class BaiduOcrAdapter implements RecognitionAdapter {
  readonly engineId = 'baidu';
  readonly kind: AdapterKind = 'ocr';

  private readonly apiKey?: string;
  private readonly secretKey?: string;
  private readonly method: BaiduOcrMethod;
  private readonly minIntervalMs: number;
  private readonly http: AxiosInstance;

  private accessToken?: string;
  private tokenExpiresAt = 0;
  private nextSlotAt = 0;

  constructor(options: BaiduOcrAdapterOptions = {}) {
    this.apiKey = options.apiKey;
    this.secretKey = options.secretKey;
    this.method = options.method ?? 'accurate_basic';
    this.minIntervalMs = options.minIntervalMs ?? 200;
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: BAIDU_BASE_URL,
        timeout: options.timeoutMs ?? 30_000,
      });
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey?.trim() && this.secretKey?.trim());
  }

  async recognize(image: Uint8Array, options?: RecognizeOptions): Promise<RecognitionResult> {
    const start = Date.now();

    const { data, error } = await ErrorHandler.wrap(async () => {
      const token = await this.getAccessToken();
      await this.throttle();
      return this.callOcr(token, image, options);
    }, { engineId: this.engineId, method: this.method });

    const durationMs = Date.now() - start;
    if (error) {
      return failedResult(this.engineId, error.message, durationMs);
    }
    return { ...data, durationMs };
  }

  private async callOcr(token: string, image: Uint8Array, options?: RecognizeOptions): Promise<RecognitionResult> {
    const form = new URLSearchParams();
    form.set('image', Buffer.from(image).toString('base64'));
    form.set('probability', 'true');
    if (options?.language) form.set('language_type', options.language);

    let body: BaiduOcrResponse;
    try {
      const response = await this.http.post<BaiduOcrResponse>(`${OCR_ENDPOINT}/${this.method}`, form.toString(), {
        params: { access_token: token },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      body = response.data;
    } catch (err) {
      throw this.toAdapterError(err, 'OCR request failed');
    }

    if (body.error_code !== undefined) {
      throw new AdapterError(`Baidu OCR error ${body.error_code}: ${body.error_msg ?? 'unknown error'}`, {
        errorCode: body.error_code,
      });
    }

    const words = body.words_result ?? [];
    const lines = words.map((w) => w.words ?? '');
    const confidences = words
      .map((w) => w.probability?.average ?? 0)
      .filter((c) => c > 0);
    const confidence =
      confidences.length > 0 ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length : 0;

    const text = lines.join('\n');
    const success = text.trim().length > 0;
    return {
      engineId: this.engineId,
      text,
      confidence: clampConfidence(confidence),
      success,
      error: success ? undefined : 'no text recognized',
    };
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }
    if (!this.isAvailable()) {
      throw new AuthenticationError('Baidu OCR API key and secret key are not configured');
    }

    let body: BaiduTokenResponse;
    try {
      const response = await this.http.post<BaiduTokenResponse>(TOKEN_ENDPOINT, null, {
        params: {
          grant_type: 'client_credentials',
          client_id: this.apiKey,
          client_secret: this.secretKey,
        },
      });
      body = response.data;
    } catch (err) {
      throw this.toAdapterError(err, 'Token request failed');
    }

    if (!body.access_token) {
      throw new AuthenticationError(
        `Baidu OCR authentication failed: ${body.error_description ?? body.error ?? 'no access token returned'}`
      );
    }

    this.accessToken = body.access_token;
    // Refresh a minute early
    const ttlSeconds = body.expires_in ?? 0;
    this.tokenExpiresAt = Date.now() + Math.max(ttlSeconds - 60, 0) * 1000;
    return this.accessToken;
  }

  private async throttle(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;
    const wait = slot - now;
    if (wait > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, wait));
    }
  }

  private toAdapterError(err: unknown, prefix: string): AdapterError {
    if (err instanceof AxiosError) {
      return new AdapterError(`${prefix}: ${err.message}`, { status: err.response?.status });
    }
    return new AdapterError(`${prefix}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
