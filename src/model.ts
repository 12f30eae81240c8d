import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import { normalizeHost } from './ollama.js';

export type ContextInfo = { contextSize: number };

export type CompleteOptions = {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
};

export type ModelWrapper = {
  getContextInfo(): Promise<ContextInfo>;
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
  dispose(): Promise<void>;
};

export type ModelBackend = 'ollama' | 'openai';

export const MODEL_BACKENDS: readonly ModelBackend[] = ['ollama', 'openai'];

export type EnsureModelOptions = {
  backend: ModelBackend;
  host: string;
  apiKey?: string;
  contextSize: number;
  temperature?: number;
  timeoutMs?: number;
  debug?: boolean;
  log?: (message: string) => void;
};

/** Base URL of the OpenAI-compatible chat API for a backend. */
export function chatBaseUrl(backend: ModelBackend, host: string): string {
  if (backend === 'ollama') return `${normalizeHost(host)}/v1`;
  return host.replace(/\/+$/, '');
}

export async function ensureModel(modelName: string, opts: EnsureModelOptions): Promise<ModelWrapper> {
  const baseURL = chatBaseUrl(opts.backend, opts.host);
  const apiKey = opts.apiKey ?? (opts.backend === 'ollama' ? 'ollama' : 'not-needed');
  if (opts.debug) {
    opts.log?.(`Using ${opts.backend} model "${modelName}" via ${baseURL}`);
  }

  const getContextInfo = async (): Promise<ContextInfo> => {
    return { contextSize: opts.contextSize };
  };

  const complete = async (prompt: string, o: CompleteOptions = {}): Promise<string> => {
    const llm = new ChatOpenAI({
      apiKey,
      model: modelName,
      configuration: { baseURL },
      temperature: o.temperature ?? opts.temperature,
      maxTokens: o.maxTokens,
      timeout: opts.timeoutMs,
      maxRetries: 1,
    });

    const messages: BaseMessage[] = [];
    if (o.system) messages.push(new SystemMessage(o.system));
    messages.push(new HumanMessage(prompt));

    const response = await llm.invoke(messages, { stop: o.stop });
    return messageText(response.content);
  };

  const dispose = async () => {
    return;
  };

  return { getContextInfo, complete, dispose };
}

export function messageText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return String(content ?? '');
  return content
    .map((part: unknown) => {
      if (typeof part === 'string') return part;
      if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
        return part.text;
      }
      return '';
    })
    .join('');
}
