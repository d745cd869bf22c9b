import { z } from 'zod';
import { config } from '../config/env';
import { ADVICE_CONTEXT } from '../config/search/constants';
import { HTTP_TIMEOUT_MS } from '../config/system/constants';
import { RetrievalUnavailableError, errorMessage } from '../errors';
import { RecommendResult } from '../types';

export interface ChatClientOptions {
  endpoint: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
}

export interface AdviceRequest {
  query: string;
  question?: string;
  results: RecommendResult[];
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

const chunkSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullish() }).partial().optional() }))
    .default([])
});

const SYSTEM_PROMPT =
  'You are a university course advisor. Recommend from the listed courses only, ' +
  'explain how each fits the student\'s interests, and mention prerequisites when relevant.';

export function chatConfigFromEnv(): ChatClientOptions | null {
  if (!config.CHAT_ENDPOINT) return null;
  return { endpoint: config.CHAT_ENDPOINT, model: config.CHAT_MODEL, apiKey: config.CHAT_API_KEY };
}

export function buildAdviceMessages(request: AdviceRequest): ChatMessage[] {
  const listing = request.results
    .slice(0, ADVICE_CONTEXT.maxCourses)
    .map((r, i) => {
      const lines = [
        `${i + 1}. ${r.title} (${r.offeringName}) - ${r.department}, ${r.level || 'level n/a'}`,
        `   ${r.description.slice(0, ADVICE_CONTEXT.descriptionChars)}`
      ];
      if (r.prerequisites.length > 0) {
        lines.push(`   Prerequisites: ${r.prerequisites.join('; ')}`);
      }
      return lines.join('\n');
    })
    .join('\n');

  const ask = request.question?.trim()
    ? `Follow-up question: ${request.question.trim()}`
    : 'Which of these courses should I take, and why?';

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `My interests: ${request.query}\n\nRecommended courses:\n${listing || '(none)'}\n\n${ask}`
    }
  ];
}

/** Text carried by one server-sent `data:` payload; `null` marks the end of the stream. */
export function parseChatEvent(data: string): string | null {
  if (data === '[DONE]') return null;
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    throw new RetrievalUnavailableError(`chat stream sent malformed data: ${data.slice(0, 80)}`);
  }
  const parsed = chunkSchema.safeParse(json);
  if (!parsed.success) return '';
  return parsed.data.choices[0]?.delta?.content ?? '';
}

/**
 * Streams advice text chunk by chunk. Nothing is requested until the first
 * chunk is pulled; the sequence ends when the service sends `[DONE]` or
 * closes the stream.
 */
export async function* streamAdvice(
  options: ChatClientOptions,
  request: AdviceRequest
): AsyncGenerator<string, void, undefined> {
  const controller = new AbortController();
  const timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
  let timeout = setTimeout(() => controller.abort(), timeoutMs);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'text/event-stream'
  };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  let res: Response;
  try {
    res = await fetch(options.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({ model: options.model, stream: true, messages: buildAdviceMessages(request) }),
      signal: controller.signal
    });
  } catch (err) {
    clearTimeout(timeout);
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
    throw new RetrievalUnavailableError(`advice failed: ${reason}`, err);
  }

  if (!res.ok || !res.body) {
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
      throw new RetrievalUnavailableError(`advice failed (${res.status}): ${reason}`, err);
    } finally {
      clearTimeout(timeout);
    }
    throw new RetrievalUnavailableError(`advice failed (${res.status}): ${text.slice(0, 200)}`);
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let ended = false;
  try {
    while (!ended) {
      const chunk = await reader.read().catch((err: unknown) => {
        throw new RetrievalUnavailableError(`advice stream interrupted: ${errorMessage(err)}`, err);
      });
      // Idle timeout: restart the clock on every chunk received.
      clearTimeout(timeout);
      timeout = setTimeout(() => controller.abort(), timeoutMs);

      let lines: string[];
      if (chunk.done) {
        // The last event may arrive without a trailing newline.
        ended = true;
        lines = (buffer + decoder.decode()).split('\n');
        buffer = '';
      } else {
        buffer += decoder.decode(chunk.value, { stream: true });
        lines = buffer.split('\n');
        buffer = lines.pop() ?? '';
      }

      for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed.startsWith('data:')) continue;
        const text = parseChatEvent(trimmed.slice(5).trim());
        if (text === null) return;
        if (text) yield text;
      }
    }
  } finally {
    clearTimeout(timeout);
    controller.abort();
    reader.releaseLock();
  }
}
