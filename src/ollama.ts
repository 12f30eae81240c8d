import { z } from 'zod';
import { errorMessage, ModelNotInstalledError, OllamaRequestError } from './errors.js';

export type FetchLike = typeof fetch;

export type PullProgress = { status: string; completed?: number; total?: number };

const TagsResponseSchema = z.object({
  models: z.array(z.object({
    name: z.string(),
    model: z.string().optional(),
  })),
});

const PullLineSchema = z.object({
  status: z.string().optional(),
  error: z.string().optional(),
  completed: z.number().optional(),
  total: z.number().optional(),
});

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** `OLLAMA_HOST` is often given as `127.0.0.1:11434`; make it a base URL. */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (!trimmed) return DEFAULT_OLLAMA_HOST;
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export async function listModels(host: string, fetchImpl: FetchLike = fetch): Promise<string[]> {
  const url = `${normalizeHost(host)}/api/tags`;
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new OllamaRequestError(`Could not reach Ollama at ${normalizeHost(host)}: ${errorMessage(error)}`);
  }
  if (!response.ok) {
    throw new OllamaRequestError(`GET ${url} failed with HTTP ${response.status}`, response.status);
  }
  const parsed = TagsResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new OllamaRequestError(`Unexpected response from ${url}: ${parsed.error.message}`);
  }
  return parsed.data.models.map(m => m.model ?? m.name);
}

/** Ollama resolves an untagged name to `:latest`. */
export function hasModel(available: string[], name: string): boolean {
  if (available.includes(name)) return true;
  return !name.includes(':') && available.includes(`${name}:latest`);
}

export async function pullModel(
  host: string,
  name: string,
  onProgress?: (progress: PullProgress) => void,
  fetchImpl: FetchLike = fetch,
): Promise<void> {
  const url = `${normalizeHost(host)}/api/pull`;
  const response = await fetchImpl(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ model: name, stream: true }),
  });
  if (!response.ok || !response.body) {
    const detail = await response.text().catch(() => '');
    throw new OllamaRequestError(
      `POST ${url} failed with HTTP ${response.status}${detail ? `: ${detail.trim()}` : ''}`,
      response.status,
    );
  }

  const handleLine = (line: string) => {
    if (!line.trim()) return;
    const parsed = PullLineSchema.safeParse(JSON.parse(line));
    if (!parsed.success) return;
    const { error, status, completed, total } = parsed.data;
    if (error) throw new OllamaRequestError(error);
    if (status) onProgress?.({ status, completed, total });
  };

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffered = '';
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffered += decoder.decode(value, { stream: true });
      let newline = buffered.indexOf('\n');
      while (newline >= 0) {
        handleLine(buffered.slice(0, newline));
        buffered = buffered.slice(newline + 1);
        newline = buffered.indexOf('\n');
      }
    }
    handleLine(buffered + decoder.decode());
  } catch (error) {
    // Stop the download on the server side too.
    await reader.cancel(errorMessage(error));
    throw error;
  } finally {
    reader.releaseLock();
  }
}

export async function ensureModelAvailable(
  host: string,
  model: string,
  opts: {
    autoPull: boolean;
    onPullStart?: () => void;
    onPullProgress?: (progress: PullProgress) => void;
    fetchImpl?: FetchLike;
  },
): Promise<{ pulled: boolean }> {
  const available = await listModels(host, opts.fetchImpl);
  if (hasModel(available, model)) return { pulled: false };
  if (!opts.autoPull) throw new ModelNotInstalledError(model, available);

  opts.onPullStart?.();
  try {
    await pullModel(host, model, opts.onPullProgress, opts.fetchImpl);
  } catch (error) {
    throw new ModelNotInstalledError(model, available, error);
  }
  return { pulled: true };
}
