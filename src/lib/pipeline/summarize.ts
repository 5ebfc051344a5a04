/**
 * Article summarization via the external language model
 */

import { Language } from "../model";
import { CompletionClient } from "../llm/client";
import { errorMessage } from "../errors";
import { logger } from "../logger";

export interface SummaryRequest {
  title: string;
  body: string;
}

export type SummaryResult = { ok: true; text: string } | { ok: false; reason: string };

export interface Summarizer {
  summarize(request: SummaryRequest, signal?: AbortSignal): Promise<SummaryResult>;
}

const MAX_BODY_CHARS = 2000;

export function createSummaryPrompt(request: SummaryRequest, language: Language): string {
  const body = request.body.slice(0, MAX_BODY_CHARS);

  if (language === "ru") {
    return `Создай краткое резюме статьи в 2-3 предложения на русском языке.

Заголовок: ${request.title}

Содержание: ${body}

Требования:
- Пиши профессионально, как для трейдеров и аналитиков
- Выдели ключевые факты и их влияние на рынок
- Не добавляй фактов, которых нет в статье

Резюме:`;
  }

  return `Create a brief article summary in 2-3 sentences in English.

Title: ${request.title}

Content: ${body}

Requirements:
- Write professionally for traders and analysts
- Highlight key facts and their market impact
- Do not add facts that are not in the article

Summary:`;
}

export class LlmSummarizer implements Summarizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly language: Language
  ) {}

  async summarize(request: SummaryRequest, signal?: AbortSignal): Promise<SummaryResult> {
    if (!request.title.trim() && !request.body.trim()) {
      return { ok: false, reason: "nothing to summarize" };
    }

    try {
      const text = await this.client.complete({
        system:
          this.language === "ru"
            ? "Ты - эксперт по сельскохозяйственным рынкам."
            : "You are an expert agriculture market analyst.",
        prompt: createSummaryPrompt(request, this.language),
        maxTokens: 250,
        signal,
      });
      const trimmed = text.trim();
      return trimmed ? { ok: true, text: trimmed } : { ok: false, reason: "empty response" };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }
}

/**
 * Run one summarization with a deadline. The summarizer's own signal is aborted
 * on timeout or when the parent signal fires.
 */
export async function summarizeWithTimeout(
  summarizer: Summarizer,
  request: SummaryRequest,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<SummaryResult> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<SummaryResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`summary timed out after ${timeoutMs}ms`));
      resolve({ ok: false, reason: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      summarizer.summarize(request, controller.signal).catch(
        (error: unknown): SummaryResult => ({ ok: false, reason: errorMessage(error) })
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
    if (!controller.signal.aborted) {
      controller.abort();
    }
    logger.debug(`Summary request finished for "${request.title.slice(0, 60)}"`);
  }
}
