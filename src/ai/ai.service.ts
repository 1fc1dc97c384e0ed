// src/ai/ai.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { OpenAI } from 'openai';

import { advisorConfig } from '../config/advisor.config';
import { ModelInvocationError, errorMessage } from '../shared/errors';
import { AiUsageService } from './ai-usage.service';
import { CompletionRequest, CompletionResult } from './ai.types';

@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);
  private readonly model: string;

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.model = config.openai.model;
  }

  /**
   * Sends one prompt as a single user message and returns the raw text.
   * Failures are not papered over with a fallback answer: the caller decides.
   * An aborted signal surfaces as the SDK's abort error, untouched.
   */
  async complete(req: CompletionRequest): Promise<CompletionResult> {
    let res: OpenAI.Chat.Completions.ChatCompletion;
    try {
      res = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: req.prompt }],
          temperature: req.temperature,
        },
        { signal: req.signal },
      );
    } catch (error) {
      if (req.signal?.aborted) throw error;

      this.logger.error(
        `Error while calling OpenAI (${req.kind}): ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ModelInvocationError(
        `Model call failed (${req.kind}): ${errorMessage(error)}`,
        req.kind,
        { cause: error },
      );
    }

    // 🔢 metering
    const usage = res.usage;
    let tokens: CompletionResult['usage'];
    if (usage) {
      const promptTokens = usage.prompt_tokens ?? 0;
      const completionTokens = usage.completion_tokens ?? 0;
      const totalTokens = usage.total_tokens ?? promptTokens + completionTokens;
      tokens = { inputTokens: promptTokens, outputTokens: completionTokens, totalTokens };

      await this.aiUsage.record({
        kind: req.kind,
        model: this.model,
        inputTokens: promptTokens,
        outputTokens: completionTokens,
        totalTokens,
        costUsd: this.aiUsage.computeCostUsd(this.model, promptTokens, completionTokens),
        extra: req.extra,
      });
    }

    const text = res.choices?.[0]?.message?.content;
    if (text === null || text === undefined) {
      throw new ModelInvocationError(
        `Model returned no content (${req.kind})`,
        req.kind,
      );
    }

    return { text, model: this.model, usage: tokens };
  }
}
