import axios, { type AxiosInstance } from 'axios';

import type { UnavailableReason } from './errors';
import { ClassifierRequestSchema, ClassifierResponseSchema, type ClassifierRequestBody } from './llmSchema';
import { summarizeSession, type SessionSnapshot, CONTEXT_TURNS } from './session';
import { INTENT_TYPES, type IntentType } from './types';

export type ClassifierResponse =
  | {
      status: 'ok';
      intentType: IntentType;
      confidence: number;
      entities: Record<string, unknown>;
    }
  | { status: 'unavailable'; reason: UnavailableReason; detail?: string };

export interface ClassifyOptions {
  signal: AbortSignal;
}

/** Remote intent classification. Implementations report failure as `unavailable`. */
export interface ClassifierCapability {
  classify(text: string, context: SessionSnapshot, options: ClassifyOptions): Promise<ClassifierResponse>;
}

export interface HttpClassifierConfig {
  baseUrl: string;
  apiKey?: string | null;
  path?: string;
  /** Pre-built client, e.g. one with a custom adapter. */
  client?: AxiosInstance;
}

export function buildClassifierRequest(text: string, context: SessionSnapshot): ClassifierRequestBody {
  return ClassifierRequestSchema.parse({
    text,
    context: summarizeSession(context),
    history: context.turns.slice(-CONTEXT_TURNS).map((turn) => ({ role: turn.role, content: turn.content })),
    intents: [...INTENT_TYPES],
  });
}

/** Classifier capability backed by a JSON endpoint: POST `{text, context, history}`. */
export class HttpClassifierCapability implements ClassifierCapability {
  private readonly client: AxiosInstance;
  private readonly path: string;
  private readonly apiKey: string | null;

  constructor(cfg: HttpClassifierConfig) {
    this.client = cfg.client ?? axios.create({ baseURL: cfg.baseUrl.replace(/\/$/, '') });
    this.path = cfg.path ?? '/v1/assistant/classify';
    this.apiKey = cfg.apiKey?.trim() ? cfg.apiKey.trim() : null;
  }

  /** Default headers incl. x-api-key if present. */
  withAuth(extra: Record<string, string> = {}): Record<string, string> {
    return {
      'content-type': 'application/json',
      ...(this.apiKey ? { 'x-api-key': this.apiKey } : {}),
      ...extra,
    };
  }

  async classify(text: string, context: SessionSnapshot, options: ClassifyOptions): Promise<ClassifierResponse> {
    if (!text.trim()) {
      return { status: 'unavailable', reason: 'invalid_response', detail: 'empty text' };
    }
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(this.path, buildClassifierRequest(text, context), {
        headers: this.withAuth(),
        signal: options.signal,
      });
      data = response.data;
    } catch (error) {
      if (axios.isCancel(error) || options.signal.aborted) {
        return { status: 'unavailable', reason: 'timeout' };
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        return {
          status: 'unavailable',
          reason: status === undefined ? 'network' : 'unavailable',
          detail: status === undefined ? error.code ?? error.message : `http ${status}`,
        };
      }
      return { status: 'unavailable', reason: 'error', detail: error instanceof Error ? error.message : String(error) };
    }

    const parsed = ClassifierResponseSchema.safeParse(data);
    if (!parsed.success) {
      return {
        status: 'unavailable',
        reason: 'invalid_response',
        detail: parsed.error.issues.map((issue) => issue.path.join('.') || issue.message).join(', '),
      };
    }
    return {
      status: 'ok',
      intentType: parsed.data.intent,
      confidence: parsed.data.confidence,
      entities: parsed.data.entities ?? {},
    };
  }
}
